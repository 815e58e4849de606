import { ICareerStatsProvider } from './shared/stats-provider.interface';
import { NbaStatsApiClient } from './nba-stats/nba-stats-api-client';
import { NbaStatsProvider } from './nba-stats/nba-stats-provider';
import { logger } from '../config/logger.config';

export type ProviderType = 'nba-stats';

export interface ProviderConfig {
  baseURL: string;
  rosterSeason: string;
}

/**
 * Factory for career stats providers, selected at startup.
 */
export class CareerStatsProviderFactory {
  static createProvider(providerType: ProviderType, config: ProviderConfig): ICareerStatsProvider {
    logger.info(`Creating career stats provider: ${providerType}`, { baseURL: config.baseURL });

    switch (providerType) {
      case 'nba-stats': {
        const client = new NbaStatsApiClient({ baseURL: config.baseURL });
        return new NbaStatsProvider(client, config.rosterSeason);
      }

      default: {
        const unknownType: never = providerType;
        throw new Error(`Unknown career stats provider: ${String(unknownType)}`);
      }
    }
  }
}
