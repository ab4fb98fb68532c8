import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_MODEL, DRONE_MODELS, getPerformanceProfile, isKnownModel } from './PerformanceProfiles';

describe('PerformanceProfiles', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the table entry for a known model', () => {
    const profile = getPerformanceProfile('Heavy Hexacopter');
    expect(profile.maxSpeed).toBe(12);
    expect(profile.maxRange).toBe(15000);
    expect(profile.batteryCapacity).toBe(800);
    expect(profile.powerConsumption).toBe(900);
    expect(profile.payloadCapacity).toBe(10);
  });

  it('falls back to the default model for unknown tags with one warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const profile = getPerformanceProfile('Paper Plane');
    expect(profile).toBe(getPerformanceProfile(DEFAULT_MODEL));
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[PerformanceProfiles] Unknown model "Paper Plane", using "Light Quadcopter"');
  });

  it('keeps every built-in profile positive and frozen', () => {
    for (const model of DRONE_MODELS) {
      const profile = getPerformanceProfile(model);
      expect(Object.isFrozen(profile)).toBe(true);
      for (const value of Object.values(profile)) {
        expect(value).toBeGreaterThan(0);
      }
    }
  });

  it('recognises only the fixed model tags', () => {
    expect(isKnownModel('Fixed Wing VTOL')).toBe(true);
    expect(isKnownModel('fixed wing vtol')).toBe(false);
  });
});
