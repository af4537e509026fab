import { describe, it, expect } from 'vitest';
import { emptyProfile, type TripProfile } from '@shared/schema';
import { formatDocument, toDocument } from './tripDocument';

describe('toDocument', () => {
  it('wraps the trip in the fixed envelope', () => {
    const doc = toDocument(emptyProfile());

    expect(doc.version).toBe('1.1');
    expect(doc.agentName).toBe('roadtrip_trip_planner');
    expect(doc.description).toBe('User-provided configuration for a road-trip planner AI.');
    expect(Object.keys(doc)).toEqual(['version', 'agentName', 'description', 'tripConfig']);
  });

  it('carries the empty profile defaults', () => {
    const { tripConfig } = toDocument(emptyProfile());

    expect(tripConfig.trip_direction).toBe('round_trip');
    expect(tripConfig.default_max_detour_hours).toBe(2.0);
    expect(tripConfig.points_of_interest).toEqual([]);
  });

  it('lists trip fields in declaration order', () => {
    const { tripConfig } = toDocument(emptyProfile());

    expect(Object.keys(tripConfig)).toEqual([
      'trip_name',
      'origin',
      'destination',
      'trip_direction',
      'total_days_available',
      'max_daily_drive_hours',
      'driving_days_preference',
      'overnight_stop_distance_style',
      'overall_trip_budget',
      'lodging_budget_per_night',
      'food_budget_per_day_per_person',
      'lodging_style',
      'travelers_description',
      'mobility_or_special_needs',
      'auto_discovery_categories',
      'default_max_detour_hours',
      'points_of_interest',
      'planning_focus',
      'output_detail_level',
    ]);
  });

  it('substitutes defaults for absent fields and null for the rest', () => {
    const { tripConfig } = toDocument({ trip_name: 'Sparse', origin: 'Reno, NV' });

    expect(tripConfig).toEqual({
      trip_name: 'Sparse',
      origin: 'Reno, NV',
      destination: null,
      trip_direction: 'round_trip',
      total_days_available: null,
      max_daily_drive_hours: null,
      driving_days_preference: 'balanced',
      overnight_stop_distance_style: 'evenly_spread',
      overall_trip_budget: null,
      lodging_budget_per_night: null,
      food_budget_per_day_per_person: null,
      lodging_style: 'upscale',
      travelers_description: null,
      mobility_or_special_needs: null,
      auto_discovery_categories: [],
      default_max_detour_hours: 2,
      points_of_interest: [],
      planning_focus: 'balanced',
      output_detail_level: 'daily_outline',
    });
  });

  it('passes point-of-interest detour values through untouched', () => {
    const trip: TripProfile = {
      ...emptyProfile(),
      default_max_detour_hours: 3,
      points_of_interest: [
        {
          label: 'Falls',
          poi_kind: 'category_along_route',
          location_hint: null,
          category: 'waterfall',
          details: null,
          max_detour_hours: null,
          min_time_on_site_hours: 2,
          priority: 'must_do',
        },
      ],
    };

    const { tripConfig } = toDocument(trip);

    expect(tripConfig.points_of_interest[0].max_detour_hours).toBeNull();
    expect(tripConfig.default_max_detour_hours).toBe(3);
  });

  it('keeps values the user chose over defaults', () => {
    const trip: TripProfile = {
      ...emptyProfile(),
      trip_direction: 'one_way',
      lodging_style: 'budget',
      overall_trip_budget: 2500,
    };

    const { tripConfig } = toDocument(trip);

    expect(tripConfig.trip_direction).toBe('one_way');
    expect(tripConfig.lodging_style).toBe('budget');
    expect(tripConfig.overall_trip_budget).toBe(2500);
  });
});

describe('formatDocument', () => {
  it('renders indented JSON in the same key order', () => {
    const text = formatDocument(toDocument(emptyProfile()));

    expect(text.startsWith('{\n  "version": "1.1",\n  "agentName": "roadtrip_trip_planner",')).toBe(true);
    expect(text.indexOf('"trip_direction"')).toBeLessThan(text.indexOf('"output_detail_level"'));
    expect(JSON.parse(text)).toEqual(toDocument(emptyProfile()));
  });
});
