import { clamp, kelvinToMired, kelvinToRgb, miredToKelvin } from './color';

describe('color', () => {
  describe('clamp', () => {
    it('should clamp to the byte range by default', () => {
      expect(clamp(-5)).toBe(0);
      expect(clamp(300)).toBe(255);
      expect(clamp(42)).toBe(42);
    });

    it('should accept custom bounds', () => {
      expect(clamp(5, 10, 20)).toBe(10);
      expect(clamp(25, 10, 20)).toBe(20);
    });
  });

  describe('miredToKelvin', () => {
    it('should use floor division', () => {
      expect(miredToKelvin(153)).toBe(6535);
      expect(miredToKelvin(250)).toBe(4000);
      expect(miredToKelvin(370)).toBe(2702);
      expect(miredToKelvin(555)).toBe(1801);
    });

    it('should convert back to mireds', () => {
      expect(kelvinToMired(4000)).toBe(250);
      expect(kelvinToMired(6500)).toBe(153);
    });
  });

  describe('kelvinToRgb', () => {
    it('should produce warm white at low temperatures', () => {
      expect(kelvinToRgb(2702)).toEqual({ r: 255, g: 166, b: 87 });
      expect(kelvinToRgb(1801)).toEqual({ r: 255, g: 126, b: 0 });
    });

    it('should produce neutral white around 4000K', () => {
      expect(kelvinToRgb(4000)).toEqual({ r: 255, g: 205, b: 166 });
      expect(kelvinToRgb(6535)).toEqual({ r: 255, g: 254, b: 250 });
    });

    it('should produce pure white at 6600K', () => {
      expect(kelvinToRgb(6600)).toEqual({ r: 255, g: 255, b: 255 });
    });

    it('should turn blue above 6600K', () => {
      expect(kelvinToRgb(6700)).toEqual({ r: 254, g: 248, b: 255 });
      expect(kelvinToRgb(10000)).toEqual({ r: 201, g: 218, b: 255 });
    });

    it('should stay within byte range across the supported mired range', () => {
      for (let mired = 153; mired <= 555; mired++) {
        const kelvin = miredToKelvin(mired);
        const { r, g, b } = kelvinToRgb(kelvin);

        expect(kelvin).toBeGreaterThanOrEqual(1000);
        expect(kelvin).toBeLessThanOrEqual(40000);
        for (const component of [r, g, b]) {
          expect(Number.isInteger(component)).toBe(true);
          expect(component).toBeGreaterThanOrEqual(0);
          expect(component).toBeLessThanOrEqual(255);
        }
      }
    });

    it('should clamp the temperature range', () => {
      expect(kelvinToRgb(500)).toEqual(kelvinToRgb(1000));
      expect(kelvinToRgb(500)).toEqual({ r: 255, g: 67, b: 0 });
      expect(kelvinToRgb(50000)).toEqual(kelvinToRgb(40000));
    });
  });
});
