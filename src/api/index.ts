import { GeniusClient } from './genius';
import { LastFmClient } from './lastfm';
import { MusicBrainzClient } from './musicbrainz';
import {
  CatalogProvider,
  EnrichmentProvider,
  GeniusConfig,
  LastFmConfig,
  LyricsReferenceProvider,
  MetadataProvider,
  MusicBrainzConfig,
  ProviderConfig,
  ProviderFactory,
} from './provider';

export * from './provider';
export { GeniusClient, LastFmClient, MusicBrainzClient };

export const defaultProviderFactory: ProviderFactory = {
  catalog: (config) => new MusicBrainzClient(config),
  enrichment: (config) => new LastFmClient(config),
  lyrics: (config) => new GeniusClient(config),
};

/**
 * Build the client matching a provider config
 */
export function createProvider(config: MusicBrainzConfig): CatalogProvider;
export function createProvider(config: LastFmConfig): EnrichmentProvider;
export function createProvider(config: GeniusConfig): LyricsReferenceProvider;
export function createProvider(config: ProviderConfig): MetadataProvider;
export function createProvider(config: ProviderConfig): MetadataProvider {
  switch (config.kind) {
    case 'musicbrainz':
      return defaultProviderFactory.catalog(config);
    case 'lastfm':
      return defaultProviderFactory.enrichment(config);
    case 'genius':
      return defaultProviderFactory.lyrics(config);
  }
}
