import { describe, expect, it } from 'vitest';
import { Level, LEVEL_NAMES, getLevel, isFatalAction, levelName } from '../types.js';

describe('Level', () => {
	it('orders levels from most to least severe', () => {
		expect(Level.Fatal).toBe(0);
		expect(Level.Error).toBe(1);
		expect(Level.Warn).toBe(2);
		expect(Level.Info).toBe(3);
		expect(Level.Debug).toBe(4);
	});
});

describe('getLevel', () => {
	it('resolves names case-insensitively', () => {
		expect(getLevel('debug')).toBe(Level.Debug);
		expect(getLevel('Debug')).toBe(Level.Debug);
		expect(getLevel('DEBUG')).toBe(Level.Debug);
		expect(getLevel('warn')).toBe(Level.Warn);
		expect(getLevel('Fatal')).toBe(Level.Fatal);
	});

	it('ignores surrounding whitespace', () => {
		expect(getLevel(' info ')).toBe(Level.Info);
	});

	it('returns undefined for unknown names', () => {
		expect(getLevel('verbose')).toBeUndefined();
		expect(getLevel('')).toBeUndefined();
		expect(getLevel('warning')).toBeUndefined();
	});
});

describe('levelName', () => {
	it('names every level', () => {
		expect(levelName(Level.Fatal)).toBe('Fatal');
		expect(levelName(Level.Error)).toBe('Error');
		expect(levelName(Level.Warn)).toBe('Warn');
		expect(levelName(Level.Info)).toBe('Info');
		expect(levelName(Level.Debug)).toBe('Debug');
	});

	it('returns Unknown outside the enum', () => {
		expect(levelName(5)).toBe('Unknown');
		expect(levelName(-1)).toBe('Unknown');
	});

	it('round-trips through getLevel', () => {
		for (const name of Object.values(LEVEL_NAMES)) {
			const level = getLevel(name);
			expect(level).toBeDefined();
			expect(levelName(level ?? -1)).toBe(name);
		}
	});
});

describe('isFatalAction', () => {
	it('accepts the three actions', () => {
		expect(isFatalAction('nothing')).toBe(true);
		expect(isFatalAction('panic')).toBe(true);
		expect(isFatalAction('exit')).toBe(true);
	});

	it('rejects anything else', () => {
		expect(isFatalAction('Exit')).toBe(false);
		expect(isFatalAction(1)).toBe(false);
		expect(isFatalAction(undefined)).toBe(false);
	});
});
