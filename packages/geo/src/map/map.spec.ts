import { describe, it, expect } from 'vitest';
import { boundsUnion, computeViewport } from './index.js';

describe('boundsUnion', () => {
  it('returns null for no boxes', () => {
    expect(boundsUnion([])).toBeNull();
  });

  it('covers every box', () => {
    expect(
      boundsUnion([
        { south: 0, west: 0, north: 1, east: 1 },
        { south: -2, west: 0.5, north: 0.5, east: 3 },
      ])
    ).toEqual({ south: -2, west: 0, north: 1, east: 3 });
  });
});

describe('computeViewport', () => {
  it('returns null without locations', () => {
    expect(computeViewport([])).toBeNull();
  });

  it('centers on the mean location at the default zoom', () => {
    const viewport = computeViewport([
      { lat: 51.5, lon: -0.1 },
      { lat: 51.6, lon: -0.3 },
      { lat: 51.7, lon: -0.2 },
    ]);
    expect(viewport?.center.lat).toBeCloseTo(51.6, 10);
    expect(viewport?.center.lon).toBeCloseTo(-0.2, 10);
    expect(viewport?.zoom).toBe(14);
    expect(viewport?.bounds).toEqual({ south: 51.5, west: -0.3, north: 51.7, east: -0.1 });
  });

  it('uses the mean rather than the bounds center', () => {
    const viewport = computeViewport(
      [
        { lat: 0, lon: 0 },
        { lat: 0, lon: 0 },
        { lat: 3, lon: 3 },
      ],
      12
    );
    expect(viewport?.center).toEqual({ lat: 1, lon: 1 });
    expect(viewport?.zoom).toBe(12);
  });
});
