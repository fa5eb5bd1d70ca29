import { describe, it, expect } from 'vitest';
import { createHealthCheckRegistry, type HealthProbe, type HealthCheckerConfigInput } from '@healthmesh/platform-core';
import { createHangingProbe, createScriptedProbe, createThrowingProbe, delay } from '@healthmesh/test-utils';

const HEALTHY = { status: 'healthy' } as const;

function buildChecker(
  register: (registry: ReturnType<typeof createHealthCheckRegistry>) => void,
  config: HealthCheckerConfigInput = {}
) {
  const registry = createHealthCheckRegistry();
  register(registry);
  return registry.build(config);
}

describe('HealthChecker', () => {
  describe('ordering', () => {
    it('should return outcomes in registration order regardless of completion order', async () => {
      const checker = buildChecker(registry => {
        registry
          .add('slowest', 'readiness', createScriptedProbe(HEALTHY, 60))
          .add('slow', 'readiness', createScriptedProbe(HEALTHY, 30))
          .add('fast', 'liveness', createScriptedProbe(HEALTHY, 0));
      });

      const first = await checker.run();
      const second = await checker.run();

      expect(first.outcomes.map(o => o.name)).toEqual(['slowest', 'slow', 'fast']);
      expect(second.outcomes.map(o => o.name)).toEqual(['slowest', 'slow', 'fast']);
    });

    it('should start every probe without waiting for the others', async () => {
      const checker = buildChecker(registry => {
        registry
          .add('a', 'readiness', createScriptedProbe(HEALTHY, 80))
          .add('b', 'readiness', createScriptedProbe(HEALTHY, 80))
          .add('c', 'readiness', createScriptedProbe(HEALTHY, 80));
      });

      const startedAt = Date.now();
      const report = await checker.run();
      const elapsed = Date.now() - startedAt;

      expect(report.overall).toBe('healthy');
      expect(elapsed).toBeLessThan(200);
    });
  });

  describe('timeouts', () => {
    it('should mark a probe exceeding its per-check timeout as timed_out', async () => {
      const checker = buildChecker(
        registry => {
          registry.add('stuck', 'readiness', createHangingProbe()).add('ok', 'readiness', createScriptedProbe(HEALTHY));
        },
        { perCheckTimeoutMs: 50, globalTimeoutMs: 1000 }
      );

      const startedAt = Date.now();
      const report = await checker.run();
      const elapsed = Date.now() - startedAt;

      expect(report.outcomes[0]).toMatchObject({
        name: 'stuck',
        status: 'timed_out',
        reason: 'no response within 50ms',
      });
      expect(report.outcomes[0].latencyMs).toBeGreaterThanOrEqual(45);
      expect(report.outcomes[1]).toMatchObject({ name: 'ok', status: 'healthy' });
      expect(report.overall).toBe('degraded');
      expect(elapsed).toBeLessThan(1000);
    });

    it('should honour a per-check timeout override', async () => {
      const checker = buildChecker(
        registry => {
          registry
            .add('patient', 'readiness', createScriptedProbe(HEALTHY, 80), { timeoutMs: 500 })
            .add('impatient', 'readiness', createScriptedProbe(HEALTHY, 80), { timeoutMs: 20 });
        },
        { perCheckTimeoutMs: 200, globalTimeoutMs: 1000 }
      );

      const report = await checker.run();

      expect(report.outcomes.map(o => o.status)).toEqual(['healthy', 'timed_out']);
      expect(report.outcomes[1].reason).toBe('no response within 20ms');
    });

    it('should abandon outstanding probes once the global timeout elapses', async () => {
      const checker = buildChecker(
        registry => {
          registry
            .add('hanging', 'readiness', createHangingProbe())
            .add('quick', 'liveness', createScriptedProbe(HEALTHY, 5));
        },
        { perCheckTimeoutMs: 5000, globalTimeoutMs: 100 }
      );

      const startedAt = Date.now();
      const report = await checker.run();
      const elapsed = Date.now() - startedAt;

      expect(elapsed).toBeGreaterThanOrEqual(95);
      expect(elapsed).toBeLessThan(100 + 150);
      expect(report.outcomes[0]).toMatchObject({
        name: 'hanging',
        status: 'timed_out',
        reason: 'abandoned after global timeout of 100ms',
      });
      expect(report.outcomes[1]).toMatchObject({ name: 'quick', status: 'healthy' });
    });

    it('should discard a result that arrives after the global timeout', async () => {
      const late = createScriptedProbe({ status: 'unhealthy', reason: 'late failure' }, 150);
      const checker = buildChecker(
        registry => {
          registry.add('late', 'readiness', late);
        },
        { perCheckTimeoutMs: 5000, globalTimeoutMs: 50 }
      );

      const report = await checker.run();
      await delay(200);

      expect(late.calls).toBe(1);
      expect(report.outcomes).toHaveLength(1);
      expect(report.outcomes[0].status).toBe('timed_out');
      expect(report.outcomes[0].reason).toBe('abandoned after global timeout of 50ms');
      expect(Object.isFrozen(report.outcomes)).toBe(true);
    });
  });

  describe('failure isolation', () => {
    it('should convert a rejecting probe into unhealthy without affecting siblings', async () => {
      const checker = buildChecker(registry => {
        registry
          .add('before', 'readiness', createScriptedProbe(HEALTHY, 10))
          .add('broken', 'readiness', createThrowingProbe(new Error('boom'), 5))
          .add('after', 'liveness', createScriptedProbe(HEALTHY, 10));
      });

      const report = await checker.run();

      expect(report.outcomes.map(o => [o.name, o.status])).toEqual([
        ['before', 'healthy'],
        ['broken', 'unhealthy'],
        ['after', 'healthy'],
      ]);
      expect(report.outcomes[1].reason).toBe('boom');
    });

    it('should convert a synchronous throw into unhealthy', async () => {
      const throwsSynchronously: HealthProbe = {
        type: 'custom',
        check: () => {
          throw new Error('sync failure');
        },
      };
      const checker = buildChecker(registry => {
        registry.add('sync', 'readiness', throwsSynchronously);
      });

      const report = await checker.run();

      expect(report.outcomes[0]).toMatchObject({ status: 'unhealthy', reason: 'sync failure' });
    });

    it('should give a non-empty reason when a probe throws a non-error value', async () => {
      const checker = buildChecker(registry => {
        registry
          .add('string', 'readiness', createThrowingProbe('connection refused'))
          .add('empty', 'readiness', createThrowingProbe(new Error('')));
      });

      const report = await checker.run();

      expect(report.outcomes[0].reason).toBe('connection refused');
      expect(report.outcomes[1].reason).toBe('unknown error');
    });

    it('should keep siblings when a check rejects with a value that has no usable message', async () => {
      const bareObject: HealthProbe = {
        type: 'custom',
        check: () => Promise.reject(Object.create(null)),
      };
      const checker = buildChecker(registry => {
        registry
          .add('sibling', 'readiness', createScriptedProbe(HEALTHY, 5))
          .add('bare', 'readiness', bareObject)
          .add('numeric', 'liveness', createThrowingProbe(Object.assign(new Error(), { message: 503 })));
      });

      const report = await checker.run();

      expect(report.outcomes.map(o => [o.name, o.status, o.reason])).toEqual([
        ['sibling', 'healthy', undefined],
        ['bare', 'unhealthy', 'unknown error'],
        ['numeric', 'unhealthy', '503'],
      ]);
      expect(report.overall).toBe('unhealthy');
    });

    it('should accept closures returning booleans', async () => {
      const checker = buildChecker(registry => {
        registry.add('up', 'liveness', () => true).add('down', 'readiness', async () => false);
      });

      const report = await checker.run();

      expect(report.outcomes[0].status).toBe('healthy');
      expect(report.outcomes[1]).toMatchObject({ status: 'unhealthy', reason: 'check reported failure' });
    });
  });

  describe('kind filters', () => {
    const checker = buildChecker(registry => {
      registry
        .add('db', 'readiness', createScriptedProbe(HEALTHY))
        .add('proc', 'liveness', createScriptedProbe(HEALTHY))
        .add('core', 'both', createScriptedProbe(HEALTHY));
    });

    it('should run every check for the all filter', async () => {
      const report = await checker.run('all');
      expect(report.outcomes.map(o => o.name)).toEqual(['db', 'proc', 'core']);
      expect(report.filter).toBe('all');
    });

    it('should include both-kind checks in the liveness filter', async () => {
      const report = await checker.run('liveness');
      expect(report.outcomes.map(o => o.name)).toEqual(['proc', 'core']);
    });

    it('should include both-kind checks in the readiness filter', async () => {
      const report = await checker.run('readiness');
      expect(report.outcomes.map(o => o.name)).toEqual(['db', 'core']);
    });

    it('should report vacuous health when no check matches the filter', async () => {
      const readinessOnly = buildChecker(registry => {
        registry.add('db', 'readiness', createScriptedProbe({ status: 'unhealthy', reason: 'down' }));
      });

      const report = await readinessOnly.run('liveness');

      expect(report.overall).toBe('healthy');
      expect(report.outcomes).toEqual([]);
    });
  });

  describe('empty checker', () => {
    it.each(['all', 'liveness', 'readiness'] as const)('should report healthy for the %s filter', async filter => {
      const checker = createHealthCheckRegistry().build();

      const report = await checker.run(filter);

      expect(report.overall).toBe('healthy');
      expect(report.outcomes).toEqual([]);
    });
  });

  describe('merge policy', () => {
    const register = (registry: ReturnType<typeof createHealthCheckRegistry>) => {
      registry
        .add('proc', 'liveness', createScriptedProbe(HEALTHY))
        .add('cache', 'readiness', createScriptedProbe({ status: 'unhealthy', reason: 'refused' }));
    };

    it('should degrade on a readiness failure under the lenient policy', async () => {
      const report = await buildChecker(register, { mergePolicy: 'lenient' }).run();
      expect(report.overall).toBe('degraded');
    });

    it('should be unhealthy on a readiness failure under the strict policy', async () => {
      const report = await buildChecker(register, { mergePolicy: 'strict' }).run();
      expect(report.overall).toBe('unhealthy');
    });

    it.each(['lenient', 'strict'] as const)('should be unhealthy on a liveness failure under the %s policy', async mergePolicy => {
      const checker = buildChecker(
        registry => {
          registry
            .add('proc', 'liveness', createScriptedProbe({ status: 'unhealthy', reason: 'wedged' }))
            .add('db', 'readiness', createScriptedProbe(HEALTHY));
        },
        { mergePolicy }
      );

      const report = await checker.run();

      expect(report.overall).toBe('unhealthy');
    });
  });

  describe('report', () => {
    it('should carry service identity and timing', async () => {
      const checker = buildChecker(
        registry => {
          registry.add('db', 'readiness', createScriptedProbe({ status: 'healthy', message: 'primary' }));
        },
        { serviceName: 'orders', version: '2.1.0' }
      );

      const before = Date.now();
      const report = await checker.run();

      expect(report.service).toBe('orders');
      expect(report.version).toBe('2.1.0');
      expect(report.generatedAt.getTime()).toBeGreaterThanOrEqual(before);
      expect(report.durationMs).toBeGreaterThanOrEqual(0);
      expect(report.outcomes[0]).toEqual({
        name: 'db',
        kind: 'readiness',
        status: 'healthy',
        message: 'primary',
        latencyMs: expect.any(Number),
      });
    });

    it('should build independent reports for concurrent runs', async () => {
      const probe = createScriptedProbe(HEALTHY, 20);
      const checker = buildChecker(registry => {
        registry.add('db', 'readiness', probe);
      });

      const [first, second] = await Promise.all([checker.run(), checker.run()]);

      expect(probe.calls).toBe(2);
      expect(first).not.toBe(second);
      expect(first.outcomes[0]).not.toBe(second.outcomes[0]);
      expect(Object.isFrozen(first)).toBe(true);
      expect(Object.isFrozen(first.outcomes[0])).toBe(true);
    });
  });
});
