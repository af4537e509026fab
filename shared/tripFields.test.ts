import { describe, it, expect } from 'vitest';
import { POI_BOUNDS, TRIP_BOUNDS, TRIP_FORM_SECTIONS, clampNumber, describeStop } from './tripFields';

describe('clampNumber', () => {
  it('parses numeric strings', () => {
    expect(clampNumber('4.5', TRIP_BOUNDS.max_daily_drive_hours)).toBe(4.5);
  });

  it('returns null for blank or non-numeric input', () => {
    expect(clampNumber('', TRIP_BOUNDS.max_daily_drive_hours)).toBeNull();
    expect(clampNumber('five', TRIP_BOUNDS.max_daily_drive_hours)).toBeNull();
    expect(clampNumber(undefined, TRIP_BOUNDS.max_daily_drive_hours)).toBeNull();
  });

  it('clamps into the field range', () => {
    expect(clampNumber(0, TRIP_BOUNDS.total_days_available)).toBe(1);
    expect(clampNumber(365, TRIP_BOUNDS.total_days_available)).toBe(90);
  });

  it('treats zero as unset where the field allows it', () => {
    expect(clampNumber(0, POI_BOUNDS.max_detour_hours)).toBeNull();
    expect(clampNumber(0.5, POI_BOUNDS.max_detour_hours)).toBe(0.5);
  });
});

describe('describeStop', () => {
  const stop = {
    label: 'Biltmore Estate',
    poi_kind: 'specific_stop' as const,
    location_hint: 'Asheville, NC',
    category: null,
    details: null,
    max_detour_hours: null,
    min_time_on_site_hours: 3,
    priority: 'must_do' as const,
  };

  it('numbers the stop and shows its priority', () => {
    expect(describeStop(stop, 2)).toBe('Stop 2: Biltmore Estate - Must do');
  });

  it('falls back to the position when the label is empty', () => {
    expect(describeStop({ ...stop, label: '', priority: 'nice_to_have' }, 1)).toBe('Stop 1: Stop 1 - Nice to have');
  });
});

describe('TRIP_FORM_SECTIONS', () => {
  it('lists every section with at least one field', () => {
    expect(TRIP_FORM_SECTIONS.map((section) => section.id)).toEqual(['trip-info', 'preferences', 'ai-itinerary']);
    for (const section of TRIP_FORM_SECTIONS) {
      expect(section.fields.length).toBeGreaterThan(0);
    }
  });
});
