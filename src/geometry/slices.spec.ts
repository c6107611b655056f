import { walkAngles } from './angles.js';
import { buildSlices } from './slices.js';

const center = { x: 300, y: 200 };

describe('buildSlices', () => {
  it('should build pie wedges for equal quarters', () => {
    const slices = buildSlices(walkAngles([1, 1, 1, 1], 4, 0), { center, radius: 170, innerRadius: 0, donut: false });

    expect(slices.map(s => s.path)).toEqual([
      'M470,200A170,170,0,0,0,300,30L300,200Z',
      'M300,370A170,170,0,0,0,470,198.81L300,200Z',
      'M130,200A170,170,0,0,0,301.19,370L300,200Z',
      'M300,30A170,170,0,0,0,130,201.19L300,200Z',
    ]);
    expect(slices.map(s => s.fill)).toEqual([
      'rgb(255, 40, 40)',
      'rgb(180, 40, 40)',
      'rgb(143, 40, 40)',
      'rgb(118, 40, 40)',
    ]);
  });

  it('should keep bookkeeping and drawn start angles apart', () => {
    const [, second] = buildSlices(walkAngles([1, 1], 2, 0), { center, radius: 170, innerRadius: 0, donut: false });

    expect(second).toMatchObject({ index: 1, seriesIndex: 1, startAngle: 180, drawnStartAngle: 179.6, endAngle: 360 });
  });

  it('should build ring segments for a donut', () => {
    const slices = buildSlices(walkAngles([1, 1, 1, 1], 4, 0), { center, radius: 170, innerRadius: 130, donut: true });

    expect(slices[0].path).toBe('M470,200A170,170,0,0,0,300,30L300,70A130,130,0,0,1,430,200Z');
    expect(slices[1].path).toBe('M300,370A170,170,0,0,0,470,198.81L430,199.09A130,130,0,0,1,300,330Z');
    expect(slices[0].commands.map(c => c.type)).toEqual(['M', 'A', 'L', 'A', 'Z']);
  });

  it('should skip zero entries but keep their series index', () => {
    const slices = buildSlices(walkAngles([10, 0, 5], 15, 0), { center, radius: 170, innerRadius: 0, donut: false });

    expect(slices.map(s => [s.index, s.seriesIndex])).toEqual([
      [0, 0],
      [1, 2],
    ]);
    expect(slices[0].largeArc).toBe(1);
  });

  it('should draw a single value as an almost full circle', () => {
    const [slice] = buildSlices(walkAngles([1], 1, 0), { center, radius: 170, innerRadius: 0, donut: false });

    expect(slice.endAngle).toBe(359.99);
    expect(slice.path).toBe('M299.97,30A170,170,0,1,0,300,30L300,200Z');
  });
});
