/**
 * Health Check Module
 *
 * Liveness report for monitoring and k8s probes. Never consults the item
 * store: the service is healthy whatever the store holds.
 */

export interface ServiceInfo {
  name: string;
  version: string;
}

export interface HealthStatus {
  status: 'healthy';
  timestamp: string;
  service: string;
  version: string;
}

export function getHealthStatus(service: ServiceInfo, now: Date = new Date()): HealthStatus {
  return {
    status: 'healthy',
    timestamp: now.toISOString(),
    service: service.name,
    version: service.version,
  };
}
