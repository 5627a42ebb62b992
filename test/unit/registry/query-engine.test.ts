import { formatServiceUrl, QueryEngine } from '../../../src/registry/QueryEngine';
import { LivenessEvaluator } from '../../../src/registry/LivenessEvaluator';
import { ServiceRecordStore } from '../../../src/registry/ServiceRecordStore';
import { ManualClock } from '../../helpers/ManualClock';

describe('QueryEngine', () => {
  let clock: ManualClock;
  let store: ServiceRecordStore;
  let liveness: LivenessEvaluator;
  let queries: QueryEngine;

  const register = (name: string, serviceType: string, host: string = 'localhost', port: number = 4080) =>
    store.register({ name, host, port, serviceType });

  beforeEach(() => {
    clock = new ManualClock(0);
    store = new ServiceRecordStore({ clock });
    liveness = new LivenessEvaluator(store, { clock });
    queries = new QueryEngine(store, { clock, heartbeatTimeoutMs: 5000, warningThresholdMs: 2000 });
  });

  describe('findService', () => {
    it('should find a freshly registered service until it goes stale', () => {
      register('api_server', 'api');

      expect(queries.findService('api')?.name).toBe('api_server');

      clock.advance(5000);
      expect(queries.findService('api')?.name).toBe('api_server');

      clock.advance(0.1);
      expect(queries.getActiveServices()).toEqual([]);
      expect(queries.findService('api')).toBeUndefined();
    });

    it('should return the earliest registered active instance', () => {
      register('w1', 'worker');
      clock.advance(1000);
      register('w2', 'worker');

      expect(queries.findService('worker')?.name).toBe('w1');

      clock.advance(4500);
      liveness.heartbeat('w2');

      expect(queries.findService('worker')?.name).toBe('w2');
    });

    it('should return undefined for an unknown type', () => {
      register('w1', 'worker');

      expect(queries.findService('cache')).toBeUndefined();
    });

    it('should not evict stale records', () => {
      register('w1', 'worker');
      clock.advance(10000);

      queries.findService('worker');

      expect(store.has('w1')).toBe(true);
    });
  });

  describe('getServicesByType', () => {
    it('should include stale records in registration order', () => {
      register('w1', 'worker');
      register('api1', 'api');
      register('w2', 'worker');
      clock.advance(6000);
      liveness.heartbeat('w2');

      expect(queries.getServicesByType('worker').map(record => record.name)).toEqual(['w1', 'w2']);
      expect(queries.getActiveServices().map(record => record.name)).toEqual(['w2']);
      expect(queries.getServicesByType('cache')).toEqual([]);
    });
  });

  describe('getServiceUrl', () => {
    it('should build http URLs with optional endpoint', () => {
      register('api_server', 'api');

      expect(queries.getServiceUrl('api_server')).toBe('http://localhost:4080');
      expect(queries.getServiceUrl('api_server', { endpoint: 'health' })).toBe('http://localhost:4080/health');
      expect(queries.getServiceUrl('api_server', { endpoint: '/status' })).toBe('http://localhost:4080/status');
      expect(queries.getServiceUrl('api_server', { scheme: 'https' })).toBe('https://localhost:4080');
    });

    it('should still format a URL for a stale service', () => {
      register('api_server', 'api');
      clock.advance(60000);

      expect(queries.getServiceUrl('api_server')).toBe('http://localhost:4080');
    });

    it('should return undefined for an unknown service', () => {
      expect(queries.getServiceUrl('missing')).toBeUndefined();
    });
  });

  describe('formatServiceUrl', () => {
    it('should bracket IPv6 hosts', () => {
      expect(formatServiceUrl({ host: '::1', port: 8443 }, { scheme: 'https' })).toBe('https://[::1]:8443');
      expect(formatServiceUrl({ host: '[fe80::1]', port: 80 })).toBe('http://[fe80::1]:80');
    });
  });

  describe('describe', () => {
    it('should attach the derived status', () => {
      register('api_server', 'api');

      expect(queries.describe('api_server')?.status).toBe('active');
      clock.advance(5001);
      expect(queries.describe('api_server')?.status).toBe('stale');
      expect(queries.describe('missing')).toBeUndefined();
    });
  });

  describe('getServiceHealth', () => {
    it('should grade heartbeat age against the warning threshold and timeout', () => {
      register('api_server', 'api');

      clock.set(1000);
      expect(queries.getServiceHealth('api_server')?.health).toBe('healthy');

      clock.set(3000);
      expect(queries.getServiceHealth('api_server')?.health).toBe('warning');

      clock.set(6000);
      const report = queries.getServiceHealth('api_server');
      expect(report?.health).toBe('unhealthy');
      expect(report?.status).toBe('stale');
      expect(report?.uptimeMs).toBe(6000);
      expect(report?.heartbeatAgeMs).toBe(6000);
      expect(report?.checkedAt).toBe(6000);
    });

    it('should clamp ages when the clock is behind the record', () => {
      clock.set(2000);
      register('api_server', 'api');
      clock.set(1500);

      const report = queries.getServiceHealth('api_server');
      expect(report?.uptimeMs).toBe(0);
      expect(report?.heartbeatAgeMs).toBe(0);
      expect(report?.health).toBe('healthy');
    });

    it('should return undefined for an unknown service', () => {
      expect(queries.getServiceHealth('missing')).toBeUndefined();
    });
  });

  describe('systemStatus', () => {
    it('should count active and stale records per type', () => {
      register('api1', 'api');
      register('w1', 'worker');
      register('w2', 'worker');
      clock.advance(6000);
      liveness.heartbeat('w1');

      expect(queries.systemStatus()).toEqual({
        total: 3,
        activeCount: 1,
        staleCount: 2,
        byType: {
          api: { total: 1, active: 0, stale: 1 },
          worker: { total: 2, active: 1, stale: 1 }
        },
        revision: 4,
        lastUpdatedAt: 6000,
        timestamp: 6000
      });
    });

    it('should count service types that collide with object prototype keys', () => {
      register('p1', '__proto__');
      register('c1', 'constructor');
      register('t1', 'toString');

      const status = queries.systemStatus();

      expect(Object.keys(status.byType)).toEqual(['__proto__', 'constructor', 'toString']);
      expect(Object.getOwnPropertyDescriptor(status.byType, '__proto__')?.value).toEqual({
        total: 1,
        active: 1,
        stale: 0
      });
      expect(status.byType['constructor']).toEqual({ total: 1, active: 1, stale: 0 });
      expect(status.byType['toString']).toEqual({ total: 1, active: 1, stale: 0 });
      expect(Object.prototype.hasOwnProperty.call(Object.prototype, 'total')).toBe(false);
    });

    it('should report an empty registry', () => {
      const status = queries.systemStatus();

      expect(status.total).toBe(0);
      expect(status.activeCount + status.staleCount).toBe(0);
      expect(status.byType).toEqual({});
    });
  });
});
