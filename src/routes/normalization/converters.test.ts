import { describe, expect, it } from 'vitest';

import {
    compassToDegrees, degreesToCompass, fahrenheitToCelsius, inchesToMm, inhgToHpa, knotsToKmh, mphToKmh, msToKmh,
    normalizeWindDirection, paToHpa
} from './converters';

describe('unit conversions', () => {
    it('converts temperatures', () => {
        expect(fahrenheitToCelsius(212)).toBe(100);
        expect(fahrenheitToCelsius(32)).toBe(0);
    });

    it('converts speeds to km/h', () => {
        expect(msToKmh(10)).toBe(36);
        expect(mphToKmh(10)).toBeCloseTo(16.09344, 10);
        expect(knotsToKmh(10)).toBeCloseTo(18.52, 10);
    });

    it('converts pressures and precipitation', () => {
        expect(inhgToHpa(29.92)).toBeCloseTo(1013.21, 1);
        expect(paToHpa(101325)).toBe(1013.25);
        expect(inchesToMm(1)).toBe(25.4);
    });

    it('propagates NaN', () => {
        expect(msToKmh(NaN)).toBeNaN();
        expect(fahrenheitToCelsius(NaN)).toBeNaN();
        expect(normalizeWindDirection(NaN)).toBeNaN();
    });
});

describe('wind direction', () => {
    it('wraps degrees into [0, 360)', () => {
        expect(normalizeWindDirection(-90)).toBe(270);
        expect(normalizeWindDirection(370)).toBe(10);
        expect(normalizeWindDirection(360)).toBe(0);
    });

    it('maps English and Spanish compass points to bin centres', () => {
        expect(compassToDegrees('N')).toBe(0);
        expect(compassToDegrees('NNE')).toBe(22.5);
        expect(compassToDegrees('W')).toBe(270);
        expect(compassToDegrees('O')).toBe(270);
        expect(compassToDegrees('SO')).toBe(225);
        expect(compassToDegrees('nno')).toBe(337.5);
    });

    it('maps full names', () => {
        expect(compassToDegrees('Noroeste')).toBe(315);
        expect(compassToDegrees('south')).toBe(180);
    });

    it('returns NaN for unknown names', () => {
        expect(compassToDegrees('XYZ')).toBeNaN();
        expect(compassToDegrees('')).toBeNaN();
    });

    it('maps degrees to the nearest English point', () => {
        expect(degreesToCompass(0)).toBe('N');
        expect(degreesToCompass(350)).toBe('N');
        expect(degreesToCompass(200)).toBe('SSW');
        expect(degreesToCompass(-90)).toBe('W');
        expect(degreesToCompass(NaN)).toBe('—');
    });
});
