import {
  distance,
  headingOf,
  normalizeAngle,
  offsetPoint,
  polylineLength,
  projectOnSegment,
  samplePolyline,
} from '../src/geometry';

describe('geometry', () => {
  it('should measure distances and headings', () => {
    expect(distance([0, 0], [3, 4])).toBe(5);
    expect(headingOf([0, 0], [0, 5])).toBeCloseTo(Math.PI / 2);
    expect(headingOf([0, 0], [-1, 0])).toBeCloseTo(Math.PI);
  });

  it('should wrap angles into (-pi, pi]', () => {
    expect(normalizeAngle((3 * Math.PI) / 2)).toBeCloseTo(-Math.PI / 2);
    expect(normalizeAngle(-Math.PI)).toBeCloseTo(Math.PI);
    expect(normalizeAngle(0.25)).toBe(0.25);
  });

  it('should project onto a segment', () => {
    const inside = projectOnSegment([5, 3], [0, 0], [10, 0]);
    expect(inside.t).toBeCloseTo(0.5);
    expect(inside.point).toEqual([5, 0]);
    expect(inside.distance).toBeCloseTo(3);

    const clamped = projectOnSegment([15, 0], [0, 0], [10, 0]);
    expect(clamped.t).toBe(1);
    expect(clamped.distance).toBeCloseTo(5);

    const extended = projectOnSegment([15, 0], [0, 0], [10, 0], false);
    expect(extended.t).toBeCloseTo(1.5);
    expect(extended.distance).toBeCloseTo(0);
  });

  it('should offset positively to the right of the heading', () => {
    const east = offsetPoint([0, 0], 0, 1);
    expect(east[0]).toBeCloseTo(0);
    expect(east[1]).toBeCloseTo(-1);

    const north = offsetPoint([0, 0], Math.PI / 2, 2);
    expect(north[0]).toBeCloseTo(2);
    expect(north[1]).toBeCloseTo(0);
  });

  it('should sample a straight line at the given spacing', () => {
    const samples = samplePolyline([[0, 0], [100, 0]], 2);
    expect(samples).toHaveLength(51);
    samples.forEach((sample, k) => {
      expect(sample.position[0]).toBeCloseTo(2 * k);
      expect(sample.s).toBeCloseTo(2 * k);
    });
  });

  it('should sample across polyline corners', () => {
    const poly: [number, number][] = [[0, 0], [3, 0], [3, 4]];
    expect(polylineLength(poly)).toBe(7);

    const samples = samplePolyline(poly, 2);
    expect(samples.map((sample) => sample.s)).toEqual([0, 2, 4, 6, 7]);
    expect(samples[2].position[0]).toBeCloseTo(3);
    expect(samples[2].position[1]).toBeCloseTo(1);
    expect(samples[2].heading).toBeCloseTo(Math.PI / 2);
    expect(samples[4].position).toEqual([3, 4]);
  });
});
