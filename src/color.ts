/**
 * Colour temperature helpers.
 * RGB from Kelvin uses Tanner Helland's approximation:
 * http://www.tannerhelland.com/4435/convert-temperature-rgb-algorithm-code/
 */

import { Rgb } from './types';

export const MIN_KELVIN = 1000;
export const MAX_KELVIN = 40000;

export function clamp(value: number, min: number = 0, max: number = 255): number {
  return Math.min(Math.max(value, min), max);
}

export function miredToKelvin(mired: number): number {
  return Math.floor(1_000_000 / mired);
}

export function kelvinToMired(kelvin: number): number {
  return Math.floor(1_000_000 / kelvin);
}

function red(temperature: number): number {
  if (temperature <= 66) {
    return 255;
  }
  return clamp(329.698727446 * Math.pow(temperature - 60, -0.1332047592));
}

function green(temperature: number): number {
  if (temperature <= 66) {
    return clamp(99.4708025861 * Math.log(temperature) - 161.1195681661);
  }
  return clamp(288.1221695283 * Math.pow(temperature - 60, -0.0755148492));
}

function blue(temperature: number): number {
  if (temperature >= 66) {
    return 255;
  }
  if (temperature <= 19) {
    return 0;
  }
  return clamp(138.5177312231 * Math.log(temperature - 10) - 305.0447927307);
}

/** Components are truncated to integers in 0-255. */
export function kelvinToRgb(kelvin: number): Rgb {
  const temperature = clamp(kelvin, MIN_KELVIN, MAX_KELVIN) / 100;
  return {
    r: Math.trunc(red(temperature)),
    g: Math.trunc(green(temperature)),
    b: Math.trunc(blue(temperature)),
  };
}
