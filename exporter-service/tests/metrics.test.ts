import { describe, expect, it } from 'vitest';
import { MetricRegistry, ZONE_MODES } from '../src/metrics.js';
import { valueOf } from './helpers.js';

const zone = { device_id: '01:000001', device_name: 'Controller', zone_idx: '01', zone_name: 'Lounge' };

describe('MetricRegistry', () => {
  it('registers every series on its own registry', async () => {
    const first = new MetricRegistry();
    const second = new MetricRegistry();
    first.activeDevices.set(3);
    expect(await first.samples('ramses_active_devices')).toEqual([{ labels: {}, value: 3 }]);
    expect(await second.samples('ramses_active_devices')).toEqual([{ labels: {}, value: 0 }]);
  });

  it('returns no samples for an unknown metric', async () => {
    expect(await new MetricRegistry().samples('ramses_nope')).toEqual([]);
  });

  describe('setExclusiveLabel', () => {
    it('sets the current value and zeroes every other declared value', async () => {
      const metrics = new MetricRegistry();
      metrics.setExclusiveLabel(metrics.zoneMode, zone, 'mode', ZONE_MODES, 'off');
      const samples = await metrics.samples('ramses_zone_mode_info');
      expect(samples).toHaveLength(ZONE_MODES.length);
      expect(valueOf(samples, { mode: 'off' })).toBe(1);
      expect(samples.filter((s) => s.value === 1)).toHaveLength(1);
    });

    it('clears undeclared values seen before for the same group', async () => {
      const metrics = new MetricRegistry();
      metrics.setExclusiveLabel(metrics.zoneMode, zone, 'mode', ZONE_MODES, 'party');
      metrics.setExclusiveLabel(metrics.zoneMode, zone, 'mode', ZONE_MODES, 'countdown');
      const samples = await metrics.samples('ramses_zone_mode_info');
      expect(valueOf(samples, { mode: 'party' })).toBe(0);
      expect(valueOf(samples, { mode: 'countdown' })).toBe(1);
    });

    it('keeps groups apart', async () => {
      const metrics = new MetricRegistry();
      metrics.setExclusiveLabel(metrics.zoneInfo, { zone_idx: '01' }, 'zone_name', [], 'Lounge');
      metrics.setExclusiveLabel(metrics.zoneInfo, { zone_idx: '02' }, 'zone_name', [], 'Kitchen');
      metrics.setExclusiveLabel(metrics.zoneInfo, { zone_idx: '01' }, 'zone_name', [], 'Living room');
      const samples = await metrics.samples('ramses_zone_info');
      expect(valueOf(samples, { zone_idx: '01', zone_name: 'Lounge' })).toBe(0);
      expect(valueOf(samples, { zone_idx: '01', zone_name: 'Living room' })).toBe(1);
      expect(valueOf(samples, { zone_idx: '02', zone_name: 'Kitchen' })).toBe(1);
    });
  });

  it('keeps a single series on info gauges', async () => {
    const metrics = new MetricRegistry();
    const info = { gateway_version: '1.0', total_devices: '2', last_message_code: '30C9', last_message_verb: 'I' };
    metrics.setInfo(metrics.systemInfo, info);
    metrics.setInfo(metrics.systemInfo, { ...info, last_message_code: '1F09' });
    expect(await metrics.samples('ramses_system_info')).toEqual([
      { labels: { ...info, last_message_code: '1F09' }, value: 1 },
    ]);
  });

  it('renders the text exposition format', async () => {
    const metrics = new MetricRegistry();
    metrics.messageErrors.inc({ error_type: 'TypeError' });
    const text = await metrics.metrics();
    expect(text).toContain('ramses_message_errors_total{error_type="TypeError"} 1');
    expect(metrics.contentType).toContain('text/plain');
  });
});
