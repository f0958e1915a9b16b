import { describe, it, expect } from 'vitest';
import { usePrettyConsole } from '../logger.js';

describe('usePrettyConsole', () => {
  it('prettifies only outside production and tests', () => {
    expect(usePrettyConsole(undefined)).toBe(true);
    expect(usePrettyConsole('development')).toBe(true);
    expect(usePrettyConsole('production')).toBe(false);
    expect(usePrettyConsole('test')).toBe(false);
  });
});
