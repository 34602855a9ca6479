import { MetricsCollector } from './metrics';

describe('MetricsCollector', () => {
  it('renders counters, gauges and cumulative histogram buckets', () => {
    const m = new MetricsCollector();
    m.incCounter('issuance_mints_total', 2);
    m.setGauge('issuance_issuers', 3);
    m.observeHistogram('issuance_http_request_duration_seconds', 0.003);
    m.observeHistogram('issuance_http_request_duration_seconds', 0.02);
    m.observeHistogram('issuance_http_request_duration_seconds', 7);

    const lines = m.render().split('\n');

    expect(lines).toContain('issuance_mints_total 2');
    expect(lines).toContain('issuance_issuers 3');
    expect(lines).toContain('issuance_http_request_duration_seconds_bucket{le="0.005"} 1');
    expect(lines).toContain('issuance_http_request_duration_seconds_bucket{le="0.025"} 2');
    expect(lines).toContain('issuance_http_request_duration_seconds_bucket{le="2.5"} 2');
    expect(lines).toContain('issuance_http_request_duration_seconds_bucket{le="+Inf"} 3');
    expect(lines).toContain('issuance_http_request_duration_seconds_count 3');
  });

  it('ignores unknown metric names', () => {
    const m = new MetricsCollector();
    m.incCounter('nope_total');
    expect(m.getCounter('nope_total')).toBe(0);
  });
});
