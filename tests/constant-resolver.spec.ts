/**
 * Tests for ConstantResolver
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { RubySourceParser } from '../src/ruby/RubySourceParser.js';
import { ConstantResolver } from '../src/constant-resolution/ConstantResolver.js';

const METRICS_SOURCE = `
module Metrics
  RequestTotal = Hesiod.register_counter("request_total")
  Latency = Prometheus.histogram(:request_latency)
  NotAMetric = Foo.counter("not_a_metric")
  Dynamic = StatsD.counter(name)
end

CACHE_HIT = StatsD.counter("cache.hit")
`;

describe('ConstantResolver', () => {
  const parser = new RubySourceParser();
  let resolver: ConstantResolver;

  beforeEach(() => {
    resolver = new ConstantResolver(parser);
  });

  it('should register factory assignments on metric clients', async () => {
    const failure = await resolver.scan(METRICS_SOURCE, 'lib/metrics.rb');

    expect(failure).toBeNull();
    expect([...resolver.constantMap.entries()]).toEqual([
      ['Metrics::RequestTotal', { name: 'request_total', type: 'counter' }],
      ['Metrics::Latency', { name: 'request_latency', type: 'histogram' }],
      ['CACHE_HIT', { name: 'cache.hit', type: 'counter' }],
    ]);
  });

  it('should fold the lexical namespace with explicit target namespaces', async () => {
    await resolver.scan(`
module App
  Metrics::Jobs = StatsD.gauge("jobs")
  ::Global = StatsD.summary("global")
end
`, 'config/initializers/metrics.rb');

    expect(resolver.resolve('App::Metrics::Jobs')).toEqual({ name: 'jobs', type: 'gauge' });
    expect(resolver.resolve('Global')).toEqual({ name: 'global', type: 'summary' });
  });

  it('should return undefined for unregistered constants', async () => {
    await resolver.scan(METRICS_SOURCE, 'lib/metrics.rb');

    expect(resolver.resolve('Metrics::Unknown')).toBeUndefined();
    expect(resolver.resolve('Metrics::NotAMetric')).toBeUndefined();
  });

  it('should resolve from the innermost scope outwards', async () => {
    await resolver.scan(METRICS_SOURCE, 'lib/metrics.rb');

    expect(resolver.resolveFromScope('RequestTotal', ['Metrics::Worker', 'Metrics'])).toEqual({
      name: 'request_total',
      type: 'counter',
      constantName: 'Metrics::RequestTotal',
    });
    expect(resolver.resolveFromScope('CACHE_HIT', ['Metrics'])).toEqual({
      name: 'cache.hit',
      type: 'counter',
      constantName: 'CACHE_HIT',
    });
    expect(resolver.resolveFromScope('Latency', [])).toBeUndefined();
  });

  it('should report invalid sources without registering anything', async () => {
    const failure = await resolver.scan('module Metrics\n  X = StatsD.counter("x"\n', 'broken.rb');

    expect(failure?.filePath).toBe('broken.rb');
    expect(resolver.constantMap.size).toBe(0);
  });
});
