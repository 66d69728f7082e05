/**
 * Plan command tests
 */

import { describe, expect, test, vi } from 'vitest';
import { STYLE_OPERATIONS } from '../platform/types/provider';
import { formatOperation, formatPlan, planStyle } from './plan';

function createLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('planStyle', () => {
  test('should run every operation in order for a fresh window', () => {
    const plan = planStyle({}, { platform: 'linux', logger: createLogger() });
    expect(plan.operations.map((entry) => entry.operation)).toEqual([...STYLE_OPERATIONS]);
  });

  test('should mark operations the platform lacks', () => {
    const plan = planStyle({}, { platform: 'linux', logger: createLogger() });
    const unsupported = plan.operations
      .filter((entry) => !entry.supported)
      .map((entry) => entry.operation);
    expect(unsupported).toEqual(['vibrancy', 'windowsMaterial']);
  });

  test('should apply the preset before the overrides', () => {
    const plan = planStyle(
      { cornerRadius: 12 },
      { preset: 'windows11Mica', platform: 'windows', logger: createLogger() }
    );
    const args = Object.fromEntries(plan.operations.map((entry) => [entry.operation, entry.args]));
    expect(args.transparency).toEqual([true, 0]);
    expect(args.backgroundColor).toEqual([{ r: 255, g: 255, b: 255, a: 255 }, 0]);
    expect(args.windowsMaterial).toEqual(['mica']);
    expect(args.cornerRadius).toEqual([12]);
  });

  test('should build page css from the style', () => {
    const plan = planStyle({ allowTextSelection: false }, { platform: 'macos' });
    expect(plan.pageCss).toBe('*{user-select:none;-webkit-user-select:none}');
  });

  test('should reject an unknown platform', () => {
    expect(() => planStyle({}, { platform: 'beos' })).toThrow(
      'Unknown platform "beos" (expected macos, windows, linux)'
    );
  });

  test('should reject an invalid style', () => {
    expect(() => planStyle({ cornerRadius: -1 }, { platform: 'linux' })).toThrow(
      /^Invalid style: style\.cornerRadius: /
    );
  });

  test('should reject an unknown preset', () => {
    expect(() => planStyle({}, { preset: 'retro', platform: 'linux' })).toThrow(
      /^Invalid style: preset: /
    );
  });
});

describe('formatPlan', () => {
  test('should number operations and flag unsupported ones', () => {
    const plan = planStyle({ cornerRadius: 6 }, { platform: 'linux', logger: createLogger() });
    expect(formatOperation(plan.operations[3], 3)).toBe('4. vibrancy("none") [unsupported]');
    expect(formatOperation(plan.operations[6], 6)).toBe('7. cornerRadius(6)');
    expect(formatOperation(plan.operations[10], 10)).toBe('11. dragRegions()');
  });

  test('should print the platform header and page css', () => {
    const lines = formatPlan(
      planStyle({}, { platform: 'macos', logger: createLogger() })
    ).split('\n');
    expect(lines[0]).toBe('platform: macos (cocoa handle)');
    expect(lines).toHaveLength(1 + STYLE_OPERATIONS.length + 2);
    expect(lines.slice(-2)).toEqual(['page css:', '  (none)']);
    expect(lines[8]).toBe('  8. resizable({"resizable":true,"minimizable":true,"maximizable":true})');
  });
});

describe('planStyle debug', () => {
  test('should log skipped operations', () => {
    const logger = createLogger();
    planStyle({}, { platform: 'windows', logger, debug: true });
    expect(logger.log).toHaveBeenCalledWith('[trellis:plan] vibrancy is not supported on windows, skipped');
  });
});
