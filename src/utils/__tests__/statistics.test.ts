import { clamp, linearRegression, mean, median, percentage, standardDeviation } from '../statistics';

describe('statistics', () => {
    it('should compute mean and median', () => {
        expect(mean([])).toBe(0);
        expect(mean([2, 4, 9])).toBe(5);
        expect(median([])).toBe(0);
        expect(median([9, 1, 5])).toBe(5);
        expect(median([4, 1, 3, 2])).toBe(2.5);
    });

    it('should compute the sample standard deviation', () => {
        expect(standardDeviation([5])).toBe(0);
        expect(standardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.13809, 5);
    });

    it('should fit a line against position', () => {
        expect(linearRegression([])).toEqual({ slope: 0, intercept: 0, rSquared: 0 });
        expect(linearRegression([7])).toEqual({ slope: 0, intercept: 7, rSquared: 0 });
        expect(linearRegression([1, 3, 5, 7])).toEqual({ slope: 2, intercept: 1, rSquared: 1 });

        const flat = linearRegression([4, 4, 4]);
        expect(flat.slope).toBe(0);
        expect(flat.rSquared).toBe(0);
    });

    it('should clamp values and treat NaN as the minimum', () => {
        expect(clamp(120, 0, 100)).toBe(100);
        expect(clamp(-3, 0, 100)).toBe(0);
        expect(clamp(Number.NaN, 0, 100)).toBe(0);
        expect(clamp(42, 0, 100)).toBe(42);
    });

    it('should return 0 percent of nothing', () => {
        expect(percentage(0, 0)).toBe(0);
        expect(percentage(1, 4)).toBe(25);
    });
});
