import type { CircuitStatus } from '@/types/core';
import type { PipelineStats } from './pipeline';

export type ComponentStatus = 'healthy' | 'degraded' | 'unhealthy';
export type CacheHealth = 'healthy' | 'memory_only' | 'degraded';

export interface HealthReport {
  status: ComponentStatus;
  timestamp: string;
  uptimeSeconds: number;
  components: {
    cache: CacheHealth;
    search: ComponentStatus;
    dependencies: Record<string, ComponentStatus>;
  };
}

function fromCircuit(status: CircuitStatus): ComponentStatus {
  if (status === 'open') return 'unhealthy';
  return status === 'half_open' ? 'degraded' : 'healthy';
}

export function buildHealthReport(
  stats: PipelineStats,
  searchProviders: readonly string[],
  now: number = Date.now(),
): HealthReport {
  const dependencies: Record<string, ComponentStatus> = {};
  for (const b of stats.breakers) dependencies[b.dependency] = fromCircuit(b.status);

  const cache: CacheHealth = !stats.cache.shared ? 'memory_only' : stats.cache.shared.available ? 'healthy' : 'degraded';

  const providerStates = searchProviders.map((p) => dependencies[p] ?? 'healthy');
  let search: ComponentStatus = 'healthy';
  if (providerStates.length === 0 || providerStates.every((s) => s === 'unhealthy')) search = 'unhealthy';
  else if (providerStates.some((s) => s !== 'healthy')) search = 'degraded';

  let status: ComponentStatus = 'healthy';
  if (search === 'unhealthy') status = 'unhealthy';
  else if (search === 'degraded' || cache === 'degraded' || Object.values(dependencies).some((s) => s !== 'healthy')) {
    status = 'degraded';
  }

  return {
    status,
    timestamp: new Date(now).toISOString(),
    uptimeSeconds: stats.uptimeSeconds,
    components: { cache, search, dependencies },
  };
}
