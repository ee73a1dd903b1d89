import { describe, it, expect } from 'vitest';
import { boundingBox, haversineDistance } from '../geo.js';

describe('haversineDistance', () => {
  it('measures about 111 m per thousandth of a degree at the equator', () => {
    expect(Math.round(haversineDistance({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 0.001 }))).toBe(111);
  });

  it('measures the short way across the antimeridian', () => {
    const d = haversineDistance({ latitude: 0, longitude: 179.9995 }, { latitude: 0, longitude: -179.9995 });
    expect(Math.round(d)).toBe(111);
  });
});

describe('boundingBox', () => {
  it('uses one longitude range away from the antimeridian', () => {
    const box = boundingBox({ latitude: 0, longitude: 20 }, 200);
    expect(box.lonRanges).toHaveLength(1);
    expect(box.lonRanges[0][0]).toBeCloseTo(19.9982, 4);
    expect(box.lonRanges[0][1]).toBeCloseTo(20.0018, 4);
    expect(box.maxLat).toBeCloseTo(0.0018, 4);
  });

  it('splits the longitude range at the antimeridian', () => {
    const east = boundingBox({ latitude: 0, longitude: 179.9995 }, 200);
    expect(east.lonRanges).toHaveLength(2);
    expect(east.lonRanges[0][0]).toBeCloseTo(179.9977, 4);
    expect(east.lonRanges[0][1]).toBe(180);
    expect(east.lonRanges[1][0]).toBe(-180);
    expect(east.lonRanges[1][1]).toBeCloseTo(-179.9987, 4);

    const west = boundingBox({ latitude: 0, longitude: -179.9995 }, 200);
    expect(west.lonRanges[0][0]).toBeCloseTo(179.9987, 4);
    expect(west.lonRanges[0][1]).toBe(180);
    expect(west.lonRanges[1][0]).toBe(-180);
    expect(west.lonRanges[1][1]).toBeCloseTo(-179.9977, 4);
  });

  it('covers every longitude when the radius reaches a pole', () => {
    const box = boundingBox({ latitude: 89.999, longitude: 0 }, 200);
    expect(box.lonRanges).toEqual([[-180, 180]]);
    expect(box.maxLat).toBe(90);
  });
});
