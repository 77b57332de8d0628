/**
 * Shared utility functions
 */

import { FULL_CIRCLE_DEG } from '../constants/index.js';

// ============================================================================
// Angle Utilities
// ============================================================================

/**
 * Wrap an angle into [0, 360)
 */
export function normalizeDegrees(angleDeg: number): number {
  const wrapped = angleDeg % FULL_CIRCLE_DEG;
  // -0 and tiny negatives that round up to 360 both land on 0
  const result = wrapped < 0 ? wrapped + FULL_CIRCLE_DEG : wrapped;
  return result === FULL_CIRCLE_DEG || Object.is(result, -0) ? 0 : result;
}

// ============================================================================
// Math Utilities
// ============================================================================

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Generate `count` evenly spaced values from start to end, both ends included
 */
export function linspace(start: number, end: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];

  const span = end - start;
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(start + (span * i) / (count - 1));
  }
  return values;
}

/**
 * Arithmetic mean, NaN for an empty list
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

// ============================================================================
// String Utilities
// ============================================================================

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escape text for inclusion in HTML
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Format a number without trailing noise (e.g. 90 -> "90", 12.5 -> "12.5")
 */
export function formatNumber(value: number, maxDecimals = 6): string {
  if (!Number.isFinite(value)) return String(value);
  return String(Number(value.toFixed(maxDecimals)));
}
