import { describe, it, expect } from 'vitest';
import { emptyProfile, type PointOfInterest, type TripProfile } from '@shared/schema';
import {
  MISSING_STOP_TITLE,
  STOP_NOT_FOUND,
  addPointOfInterest,
  applyTripForm,
  createPointOfInterest,
  effectiveDetourHours,
  removePointOfInterest,
  updatePointOfInterest,
} from './tripForm';

// ============================================================================
// TEST DATA
// ============================================================================

const createPoi = (overrides: Partial<PointOfInterest> = {}): PointOfInterest => ({
  label: 'Blue Ridge overlook',
  poi_kind: 'specific_stop',
  location_hint: null,
  category: null,
  details: null,
  max_detour_hours: null,
  min_time_on_site_hours: null,
  priority: 'nice_to_have',
  ...overrides,
});

const tripWithStops = (...labels: string[]): TripProfile => ({
  ...emptyProfile(),
  points_of_interest: labels.map((label) => createPoi({ label })),
});

// ============================================================================
// TRIP FIELDS
// ============================================================================

describe('applyTripForm', () => {
  it('sets text and enum fields', () => {
    const trip = applyTripForm(emptyProfile(), {
      trip_name: 'Gulf Coast',
      origin: 'Mobile, AL',
      trip_direction: 'one_way',
      lodging_style: 'mid_range',
    });

    expect(trip.trip_name).toBe('Gulf Coast');
    expect(trip.origin).toBe('Mobile, AL');
    expect(trip.trip_direction).toBe('one_way');
    expect(trip.lodging_style).toBe('mid_range');
  });

  it('leaves fields that were not submitted alone', () => {
    const start = { ...emptyProfile(), destination: 'Austin, TX', total_days_available: 7 };
    const trip = applyTripForm(start, { origin: 'Tulsa, OK' });

    expect(trip.destination).toBe('Austin, TX');
    expect(trip.total_days_available).toBe(7);
  });

  it('does not mutate the trip it was given', () => {
    const start = emptyProfile();
    applyTripForm(start, { trip_name: 'Changed' });

    expect(start.trip_name).toBe('');
  });

  it('clamps day count and drive hours into range', () => {
    const trip = applyTripForm(emptyProfile(), {
      total_days_available: 120,
      max_daily_drive_hours: 0.5,
      default_max_detour_hours: 9,
    });

    expect(trip.total_days_available).toBe(90);
    expect(trip.max_daily_drive_hours).toBe(1.0);
    expect(trip.default_max_detour_hours).toBe(6.0);
  });

  it('rounds the day count to a whole number', () => {
    expect(applyTripForm(emptyProfile(), { total_days_available: '6.6' }).total_days_available).toBe(7);
  });

  it('keeps the current value when a required number is unusable', () => {
    const trip = applyTripForm(emptyProfile(), { max_daily_drive_hours: 'abc' });
    expect(trip.max_daily_drive_hours).toBe(5.0);
  });

  it('stores budgets of zero as null', () => {
    const start = { ...emptyProfile(), overall_trip_budget: 3000 };
    const trip = applyTripForm(start, {
      overall_trip_budget: 0,
      lodging_budget_per_night: '0',
      food_budget_per_day_per_person: 60,
    });

    expect(trip.overall_trip_budget).toBeNull();
    expect(trip.lodging_budget_per_night).toBeNull();
    expect(trip.food_budget_per_day_per_person).toBe(60);
  });

  it('clears a budget submitted as null or blank', () => {
    const start = { ...emptyProfile(), lodging_budget_per_night: 180 };

    expect(applyTripForm(start, { lodging_budget_per_night: null }).lodging_budget_per_night).toBeNull();
    expect(applyTripForm(start, { lodging_budget_per_night: '' }).lodging_budget_per_night).toBeNull();
  });

  it('treats negative budgets as zero, which is unset', () => {
    expect(applyTripForm(emptyProfile(), { overall_trip_budget: -50 }).overall_trip_budget).toBeNull();
  });

  it('de-duplicates categories into vocabulary order', () => {
    const trip = applyTripForm(emptyProfile(), {
      auto_discovery_categories: ['golf', 'waterfalls', 'golf'],
    });

    expect(trip.auto_discovery_categories).toEqual(['waterfalls', 'golf']);
  });
});

// ============================================================================
// POINTS OF INTEREST
// ============================================================================

describe('createPointOfInterest', () => {
  it('rejects a missing or blank title', () => {
    expect(createPointOfInterest({})).toEqual({ ok: false, error: MISSING_STOP_TITLE });
    expect(createPointOfInterest({ label: '   ' })).toEqual({ ok: false, error: MISSING_STOP_TITLE });
  });

  it('trims input and turns empty strings and zeros into null', () => {
    const result = createPointOfInterest({
      label: '  Shopping day ',
      poi_kind: 'city_or_region',
      location_hint: ' Atlanta ',
      category: '',
      details: '   ',
      max_detour_hours: 0,
      min_time_on_site_hours: 0,
      priority: 'must_do',
    });

    expect(result).toEqual({
      ok: true,
      value: {
        label: 'Shopping day',
        poi_kind: 'city_or_region',
        location_hint: 'Atlanta',
        category: null,
        details: null,
        max_detour_hours: null,
        min_time_on_site_hours: null,
        priority: 'must_do',
      },
    });
  });

  it('defaults kind and priority', () => {
    const result = createPointOfInterest({ label: 'Crab shack' });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.poi_kind).toBe('specific_stop');
      expect(result.value.priority).toBe('nice_to_have');
    }
  });

  it('clamps detour and time on site', () => {
    const result = createPointOfInterest({ label: 'Ranch', max_detour_hours: 8, min_time_on_site_hours: 100 });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.max_detour_hours).toBe(6);
      expect(result.value.min_time_on_site_hours).toBe(72);
    }
  });
});

describe('addPointOfInterest', () => {
  it('appends to the end of the list', () => {
    const result = addPointOfInterest(tripWithStops('First'), { label: 'Second' });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.points_of_interest.map((p) => p.label)).toEqual(['First', 'Second']);
    }
  });

  it('leaves the trip unchanged when the title is missing', () => {
    const trip = tripWithStops('First');
    const result = addPointOfInterest(trip, { label: '' });

    expect(result).toEqual({ ok: false, error: MISSING_STOP_TITLE });
    expect(trip.points_of_interest).toHaveLength(1);
  });
});

describe('updatePointOfInterest', () => {
  it('edits only the submitted fields of one stop', () => {
    const result = updatePointOfInterest(tripWithStops('A', 'B'), 1, { priority: 'must_do', details: 'Sunset' });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.points_of_interest[0]).toEqual(createPoi({ label: 'A' }));
      expect(result.value.points_of_interest[1]).toEqual(
        createPoi({ label: 'B', priority: 'must_do', details: 'Sunset' }),
      );
    }
  });

  it('reports an index outside the list', () => {
    expect(updatePointOfInterest(tripWithStops('A'), 3, { label: 'X' })).toEqual({
      ok: false,
      error: STOP_NOT_FOUND,
    });
    expect(updatePointOfInterest(tripWithStops('A'), -1, { label: 'X' })).toEqual({
      ok: false,
      error: STOP_NOT_FOUND,
    });
  });
});

describe('removePointOfInterest', () => {
  it('removes the stop and keeps the order of the rest', () => {
    const result = removePointOfInterest(tripWithStops('A', 'B', 'C'), 1);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.points_of_interest.map((p) => p.label)).toEqual(['A', 'C']);
    }
  });

  it('reports an index outside the list', () => {
    expect(removePointOfInterest(tripWithStops('A'), 1)).toEqual({ ok: false, error: STOP_NOT_FOUND });
  });
});

describe('effectiveDetourHours', () => {
  it('falls back to the trip default when the stop has none', () => {
    const trip = { ...emptyProfile(), default_max_detour_hours: 3.5 };

    expect(effectiveDetourHours(createPoi(), trip)).toBe(3.5);
    expect(effectiveDetourHours(createPoi({ max_detour_hours: 1 }), trip)).toBe(1);
  });
});
