import { describe, it, expect } from 'vitest';
import { distance3D, EARTH_RADIUS_M, formatDistance, greatCircleDistance } from '../geoMath';

describe('geoMath', () => {
  describe('greatCircleDistance', () => {
    it('should be zero for identical points', () => {
      expect(greatCircleDistance(21.0739, 105.7771, 21.0739, 105.7771)).toBe(0);
    });

    it('should measure one degree of longitude on the equator', () => {
      const expected = (EARTH_RADIUS_M * Math.PI) / 180;
      expect(greatCircleDistance(0, 0, 0, 1)).toBeCloseTo(expected, 6);
      expect(greatCircleDistance(0, 0, 0, 1)).toBeCloseTo(111194.93, 1);
    });

    it('should match a short reference distance within 1%', () => {
      // 0.0018886 degrees of latitude is about 210 m
      const distance = greatCircleDistance(10, 20, 10.0018886, 20);
      expect(Math.abs(distance - 210) / 210).toBeLessThan(0.01);
    });

    it('should be symmetric', () => {
      const there = greatCircleDistance(21.0739, 105.7771, 21.0741, 105.7775);
      const back = greatCircleDistance(21.0741, 105.7775, 21.0739, 105.7771);
      expect(there).toBeCloseTo(back, 9);
    });

    it('should measure half the circumference between antipodes', () => {
      expect(greatCircleDistance(0, 0, 0, 180)).toBeCloseTo(EARTH_RADIUS_M * Math.PI, 0);
    });
  });

  describe('distance3D', () => {
    it('should combine horizontal and vertical distance', () => {
      expect(distance3D(10, 20, 100, 10, 20, 103)).toBeCloseTo(3, 9);
    });

    it('should fall back to horizontal distance when an elevation is missing', () => {
      const horizontal = greatCircleDistance(0, 0, 0, 0.0001);
      expect(distance3D(0, 0, null, 0, 0.0001, 50)).toBe(horizontal);
      expect(distance3D(0, 0, 50, 0, 0.0001, undefined)).toBe(horizontal);
    });

    it('should never be shorter than the horizontal distance', () => {
      const horizontal = greatCircleDistance(0, 0, 0, 0.0001);
      expect(distance3D(0, 0, 0, 0, 0.0001, 5)).toBeGreaterThan(horizontal);
    });
  });

  describe('formatDistance', () => {
    it('should format meters below a kilometer', () => {
      expect(formatDistance(15.34)).toBe('15.3m');
      expect(formatDistance(0)).toBe('0.0m');
    });

    it('should format kilometers from 1000 meters', () => {
      expect(formatDistance(1000)).toBe('1.00km');
      expect(formatDistance(1200)).toBe('1.20km');
    });
  });
});
