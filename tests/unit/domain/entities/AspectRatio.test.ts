import {
    selectAspectRatioSpec,
    ratiosMatch,
    isAspectRatioLabel,
    LANDSCAPE_16_9,
    PORTRAIT_9_16,
} from '../../../../src/domain/entities/AspectRatio';

describe('AspectRatio', () => {
    describe('selectAspectRatioSpec', () => {
        it('should select 16:9 for landscape sources', () => {
            expect(selectAspectRatioSpec(16 / 9)).toBe(LANDSCAPE_16_9);
            expect(selectAspectRatioSpec(4 / 3)).toBe(LANDSCAPE_16_9);
            expect(selectAspectRatioSpec(3)).toBe(LANDSCAPE_16_9);
        });

        it('should select 9:16 for portrait sources', () => {
            expect(selectAspectRatioSpec(9 / 16)).toBe(PORTRAIT_9_16);
            expect(selectAspectRatioSpec(3 / 4)).toBe(PORTRAIT_9_16);
            expect(selectAspectRatioSpec(0.2)).toBe(PORTRAIT_9_16);
        });

        it('should select 9:16 for a square because it is numerically closer', () => {
            // |1 - 0.5625| = 0.4375 < |1 - 1.778| = 0.778
            expect(selectAspectRatioSpec(1).label).toBe('9:16');
        });

        it('should switch to 16:9 just above the midpoint between the two ratios', () => {
            // midpoint = (16/9 + 9/16) / 2 ~= 1.1701
            expect(selectAspectRatioSpec(1.16).label).toBe('9:16');
            expect(selectAspectRatioSpec(1.18).label).toBe('16:9');
        });

        it('should reject non-positive or non-finite ratios', () => {
            expect(() => selectAspectRatioSpec(0)).toThrow('Aspect ratio must be a positive number, got: 0');
            expect(() => selectAspectRatioSpec(-1)).toThrow('Aspect ratio must be a positive number');
            expect(() => selectAspectRatioSpec(Infinity)).toThrow('Aspect ratio must be a positive number');
            expect(() => selectAspectRatioSpec(NaN)).toThrow('Aspect ratio must be a positive number');
        });
    });

    describe('specs', () => {
        it('should carry the minimum resolutions', () => {
            expect(LANDSCAPE_16_9).toMatchObject({ label: '16:9', minWidth: 1280, minHeight: 720 });
            expect(PORTRAIT_9_16).toMatchObject({ label: '9:16', minWidth: 720, minHeight: 1280 });
        });
    });

    describe('ratiosMatch', () => {
        it('should treat ratios closer than 1e-5 as equal', () => {
            expect(ratiosMatch(1920 / 1080, 16 / 9)).toBe(true);
            expect(ratiosMatch(16 / 9 + 5e-6, 16 / 9)).toBe(true);
            expect(ratiosMatch(1365 / 768, 16 / 9)).toBe(false);
        });
    });

    describe('isAspectRatioLabel', () => {
        it('should accept only supported labels', () => {
            expect(isAspectRatioLabel('16:9')).toBe(true);
            expect(isAspectRatioLabel('9:16')).toBe(true);
            expect(isAspectRatioLabel('4:3')).toBe(false);
            expect(isAspectRatioLabel(undefined)).toBe(false);
        });
    });
});
