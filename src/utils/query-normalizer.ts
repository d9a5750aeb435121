/**
 * QueryNormalizer - Utilities for normalizing track and artist names before comparing or searching
 *
 * Handles common formatting variations that reduce match quality:
 * - Parentheticals (Remastered, Remix, Edit, Version, feat.)
 * - Featuring syntax variations (feat., ft., featuring)
 * - Special characters and punctuation
 * - Whitespace normalization
 */
export class QueryNormalizer {
  /**
   * Normalize track title for matching
   *
   * @example
   * normalizeTrackTitle("Smells Like Teen Spirit (Remastered 2021)")
   * // Returns: "Smells Like Teen Spirit"
   */
  static normalizeTrackTitle(title: string): string {
    if (!title) {
      return '';
    }

    return title
      .trim()
      .replace(/\(.*?(remaster|remix|edit|version|radio|album|single|explicit|clean|live|demo|mono|stereo).*?\)/gi, '')
      .replace(/[([]?\s*\b(?:feat\.?|ft\.?|featuring)\s+[^)\]]+[)\]]?/gi, '')
      .replace(/\[[^\]]*\]/g, '')
      // Keep letters of any script, digits, apostrophes and hyphens
      .replace(/[^\p{L}\p{N}\s'-]/gu, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * Normalize artist names for matching
   *
   * @example
   * normalizeArtistName("The Beatles & Friends")
   * // Returns: "Beatles Friends"
   */
  static normalizeArtistName(artist: string): string {
    if (!artist) {
      return '';
    }

    return artist
      .trim()
      .replace(/\s*&\s*/g, ' ')
      .replace(/\s+and\s+/gi, ' ')
      .replace(/\s*\b(?:feat\.?|ft\.?|featuring)\s+/gi, ' ')
      .replace(/^the\s+/gi, '')
      .replace(/[^\p{L}\p{N}\s-]/gu, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * Extract primary artist from a string that may contain featuring artists
   *
   * @example
   * extractPrimaryArtist("Main Artist feat. Featured Artist")
   * // Returns: "Main Artist"
   */
  static extractPrimaryArtist(artists: string): string {
    if (!artists) {
      return '';
    }

    const primary = artists.split(/\s+(?:feat\.?|ft\.?|featuring)\s+/i)[0];
    return this.normalizeArtistName(primary);
  }

  /**
   * Build a lookup query from a track title and artist
   *
   * @example
   * buildSearchQuery("Come as You Are (Remastered)", "Nirvana")
   * // Returns: "Come as You Are Nirvana"
   */
  static buildSearchQuery(trackTitle: string, artists: string): string {
    return [this.normalizeTrackTitle(trackTitle), this.extractPrimaryArtist(artists)]
      .filter((part) => part.length > 0)
      .join(' ')
      .replace(/\s+/g, ' ')
      .trim();
  }
}
