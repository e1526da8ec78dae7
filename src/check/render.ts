/**
 * Value renderers for check summaries. Each returns a Renderer, so callers
 * pick the unit once and reuse it for the value and the levels text.
 */

import type { Renderer } from './types.js';

/** Fixed precision with a verbatim suffix: fixed(1, ' °C') renders 21.5 as "21.5 °C". */
export function fixed(precision: number, suffix = ''): Renderer {
  return (value) => `${value.toFixed(precision)}${suffix}`;
}

export const percent: Renderer = (value) => `${value.toFixed(2)}%`;

export function perSecond(precision = 1, unit = ''): Renderer {
  return fixed(precision, unit ? ` ${unit}/s` : '/s');
}

export const integer: Renderer = (value) => `${Math.round(value)}`;

const IEC_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB'];

export const bytes: Renderer = (value) => {
  let scaled = value;
  let unit = 0;
  while (Math.abs(scaled) >= 1024 && unit < IEC_UNITS.length - 1) {
    scaled /= 1024;
    unit++;
  }
  return unit === 0 ? `${Math.round(scaled)} B` : `${scaled.toFixed(2)} ${IEC_UNITS[unit]}`;
};

/** Durations: "42 s", "5 m 3 s", "2 h 10 m", "3 d 4 h". */
export const timespan: Renderer = (seconds) => {
  const s = Math.round(Math.abs(seconds));
  const sign = seconds < 0 ? '-' : '';
  const days = Math.floor(s / 86400);
  const hours = Math.floor((s % 86400) / 3600);
  const minutes = Math.floor((s % 3600) / 60);
  const secs = s % 60;

  if (days > 0) return `${sign}${days} d ${hours} h`;
  if (hours > 0) return `${sign}${hours} h ${minutes} m`;
  if (minutes > 0) return `${sign}${minutes} m ${secs} s`;
  return `${sign}${secs} s`;
};
