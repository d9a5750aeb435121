/**
 * TrackMatcher - fuzzy track matching
 *
 * Pairs canonical tracks with enrichment tracks, and picks the best song hit
 * when looking up lyrics references.
 *
 * Uses multiple scoring factors:
 * - Title similarity (Dice coefficient + Levenshtein distance)
 * - Artist similarity
 * - Duration matching
 *
 * Returns confidence scores (0-1) for each match.
 */
import { QueryNormalizer } from '../utils/query-normalizer';
import { Track, TrackEnrichment, TrackMatchingStrategy } from '../types';

export interface MatchCandidate {
  id: string;
  title: string;
  artist?: string | null;
  durationMs?: number | null;
}

export interface MatchTarget {
  title: string;
  artist?: string | null;
  durationMs?: number | null;
}

export interface MatchScoreBreakdown {
  titleScore: number;
  artistScore: number;
  durationScore: number;
  weightsUsed: number;
}

export interface MatchResult<C extends MatchCandidate = MatchCandidate> {
  candidate: C;
  confidence: number;
  breakdown: MatchScoreBreakdown;
}

export class TrackMatcher {
  private static CONFIDENCE_THRESHOLD = 0.6;
  private static readonly TITLE_WEIGHT = 0.6;
  private static readonly ARTIST_WEIGHT = 0.2;
  private static readonly DURATION_WEIGHT = 0.2;

  /**
   * Sørensen–Dice coefficient over character bigram multisets
   *
   * @returns Score from 0 to 1 (1 = identical)
   */
  private static diceCoefficient(str1: string, str2: string): number {
    if (!str1 || !str2) return 0;
    if (str1 === str2) return 1;

    const buildBigrams = (s: string): Map<string, number> => {
      const map = new Map<string, number>();
      for (let i = 0; i < s.length - 1; i++) {
        const bg = s.substring(i, i + 2);
        map.set(bg, (map.get(bg) || 0) + 1);
      }
      return map;
    };

    const bigrams1 = buildBigrams(str1.toLowerCase());
    const bigrams2 = buildBigrams(str2.toLowerCase());

    const total1 = Array.from(bigrams1.values()).reduce((a, b) => a + b, 0);
    const total2 = Array.from(bigrams2.values()).reduce((a, b) => a + b, 0);

    if (total1 === 0 || total2 === 0) return 0;

    let intersection = 0;
    for (const [bigram, count1] of bigrams1) {
      intersection += Math.min(count1, bigrams2.get(bigram) || 0);
    }

    return (2 * intersection) / (total1 + total2);
  }

  /**
   * Minimum number of single-character edits between two strings
   */
  static levenshteinDistance(str1: string, str2: string): number {
    const s1 = str1.toLowerCase();
    const s2 = str2.toLowerCase();
    if (!s1 || !s2) return Math.max(s1.length, s2.length);

    let previous = Array.from({ length: s1.length + 1 }, (_, j) => j);

    for (let i = 1; i <= s2.length; i++) {
      const current = [i];
      for (let j = 1; j <= s1.length; j++) {
        if (s2.charAt(i - 1) === s1.charAt(j - 1)) {
          current[j] = previous[j - 1];
        } else {
          current[j] = Math.min(
            previous[j - 1] + 1, // substitution
            current[j - 1] + 1, // insertion
            previous[j] + 1 // deletion
          );
        }
      }
      previous = current;
    }

    return previous[s1.length];
  }

  private static levenshteinSimilarity(str1: string, str2: string): number {
    if (!str1 || !str2) return 0;
    if (str1 === str2) return 1;

    const maxLength = Math.max(str1.length, str2.length);
    return 1 - this.levenshteinDistance(str1, str2) / maxLength;
  }

  /**
   * Weighted blend of Dice (0.6) and Levenshtein (0.4) similarity
   *
   * @returns Score from 0 to 1 (1 = identical, case-insensitive)
   */
  static calculateStringSimilarity(str1: string, str2: string): number {
    if (!str1 || !str2) return 0;
    if (str1.toLowerCase() === str2.toLowerCase()) return 1.0;

    return this.diceCoefficient(str1, str2) * 0.6 + this.levenshteinSimilarity(str1, str2) * 0.4;
  }

  /**
   * Score a candidate against the expected track. Dimensions missing on either side
   * are left out and the remaining weights renormalized.
   */
  static scoreMatch(expected: MatchTarget, candidate: MatchCandidate): { confidence: number; breakdown: MatchScoreBreakdown } {
    let score = 0;
    let totalWeight = 0;

    let titleScore = 0;
    let artistScore = 0;
    let durationScore = 0;

    const normExpectedTitle = QueryNormalizer.normalizeTrackTitle(expected.title);
    const normCandidateTitle = QueryNormalizer.normalizeTrackTitle(candidate.title);

    if (normExpectedTitle && normCandidateTitle) {
      titleScore = this.calculateStringSimilarity(normExpectedTitle, normCandidateTitle);
      score += titleScore * this.TITLE_WEIGHT;
      totalWeight += this.TITLE_WEIGHT;
    }

    if (expected.artist && candidate.artist) {
      artistScore = this.calculateStringSimilarity(
        QueryNormalizer.normalizeArtistName(expected.artist),
        QueryNormalizer.normalizeArtistName(candidate.artist)
      );
      score += artistScore * this.ARTIST_WEIGHT;
      totalWeight += this.ARTIST_WEIGHT;
    }

    if (expected.durationMs && candidate.durationMs) {
      const variance = Math.abs(expected.durationMs - candidate.durationMs) / expected.durationMs;
      // 1.0 for an exact match, 0.0 at 20% difference or more
      durationScore = Math.max(0, 1 - variance * 5);
      score += durationScore * this.DURATION_WEIGHT;
      totalWeight += this.DURATION_WEIGHT;
    }

    const confidence = totalWeight > 0 ? score / totalWeight : 0;

    return {
      confidence,
      breakdown: { titleScore, artistScore, durationScore, weightsUsed: totalWeight },
    };
  }

  /**
   * Best candidate above the confidence threshold, or null
   */
  static findBestMatch<C extends MatchCandidate>(expected: MatchTarget, candidates: readonly C[]): MatchResult<C> | null {
    let best: MatchResult<C> | null = null;

    for (const candidate of candidates) {
      const { confidence, breakdown } = this.scoreMatch(expected, candidate);
      if (confidence > (best?.confidence ?? 0)) {
        best = { candidate, confidence, breakdown };
      }
    }

    return best && best.confidence >= this.CONFIDENCE_THRESHOLD ? best : null;
  }

  /**
   * Pair every canonical track with at most one enrichment track.
   * The result is index-aligned with `tracks`; null means no partner.
   *
   * - positional: the i-th track takes the i-th enrichment entry
   * - title: each track takes its best unused match by title (and duration when both are known)
   */
  static pairTracks(
    tracks: readonly Track[],
    enrichment: readonly TrackEnrichment[],
    strategy: TrackMatchingStrategy = 'positional'
  ): Array<TrackEnrichment | null> {
    if (strategy === 'positional') {
      return tracks.map((_, index) => enrichment[index] ?? null);
    }

    const candidates = enrichment.map((entry, index) => ({
      id: String(index),
      title: entry.title,
      durationMs: entry.durationMs,
      entry,
    }));
    const used = new Set<string>();

    return tracks.map((track) => {
      const available = candidates.filter((candidate) => !used.has(candidate.id));
      const match = this.findBestMatch({ title: track.title, durationMs: track.durationMs }, available);
      if (!match) {
        return null;
      }
      used.add(match.candidate.id);
      return match.candidate.entry;
    });
  }

  static getConfidenceThreshold(): number {
    return this.CONFIDENCE_THRESHOLD;
  }

  /**
   * Set confidence threshold (for testing or tuning)
   */
  static setConfidenceThreshold(threshold: number): void {
    if (threshold >= 0 && threshold <= 1) {
      this.CONFIDENCE_THRESHOLD = threshold;
    }
  }
}
