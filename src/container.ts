import type { Pool } from 'pg';
import type { ICareerStatsProvider } from './integrations/shared/stats-provider.interface';
import type { CareerStatsRepository } from './modules/career-stats/career-stats.repository';
import type { CareerStatsCollector } from './modules/collector/collector.service';
import type { FailureLedger } from './modules/collector/failure-ledger';

/**
 * Everything the container can hand out, by key
 */
export interface ServiceRegistry {
  pool: Pool;
  careerStatsRepo: CareerStatsRepository;
  statsProvider: ICareerStatsProvider;
  failureLedger: FailureLedger;
  collector: CareerStatsCollector;
}

export type ServiceKey = keyof ServiceRegistry;

class Container {
  private factories = new Map<ServiceKey, () => unknown>();
  private instances = new Map<ServiceKey, unknown>();

  register<K extends ServiceKey>(key: K, factory: () => ServiceRegistry[K]): void {
    this.factories.set(key, factory);
  }

  resolve<K extends ServiceKey>(key: K): ServiceRegistry[K] {
    // Return cached instance if exists
    if (this.instances.has(key)) {
      return this.instances.get(key) as ServiceRegistry[K];
    }

    // Create new instance; register() ties each key to its factory's type
    const factory = this.factories.get(key);
    if (!factory) {
      throw new Error(`No factory registered for key: ${key}`);
    }

    const instance = factory() as ServiceRegistry[K];
    this.instances.set(key, instance);
    return instance;
  }

  // For testing: clear all instances
  clearInstances(): void {
    this.instances.clear();
  }

  // For testing: override with mock
  override<K extends ServiceKey>(key: K, instance: ServiceRegistry[K]): void {
    this.instances.set(key, instance);
  }
}

export const container = new Container();

export const KEYS = {
  // Database
  POOL: 'pool',

  // Repositories
  CAREER_STATS_REPO: 'careerStatsRepo',

  // External providers
  STATS_PROVIDER: 'statsProvider',

  // Collector
  FAILURE_LEDGER: 'failureLedger',
  COLLECTOR: 'collector',
} as const satisfies Record<string, ServiceKey>;
