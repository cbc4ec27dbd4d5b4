import { describe, expect, it } from 'vitest';
import { createTargetFilter } from '../filter.js';
import { createTestEntry } from '../testing.js';
import { Level } from '../types.js';

describe('createTargetFilter', () => {
	it('accepts everything by default', () => {
		const filter = createTargetFilter();
		expect(filter(createTestEntry({ level: Level.Debug, category: 'anything' }))).toBe(true);
		expect(filter(createTestEntry({ level: Level.Fatal }))).toBe(true);
	});

	it('drops entries less severe than maxLevel', () => {
		const filter = createTargetFilter({ maxLevel: Level.Warn });
		expect(filter(createTestEntry({ level: Level.Error }))).toBe(true);
		expect(filter(createTestEntry({ level: Level.Warn }))).toBe(true);
		expect(filter(createTestEntry({ level: Level.Info }))).toBe(false);
	});

	it('matches categories exactly', () => {
		const filter = createTargetFilter({ categories: ['db', 'http'] });
		expect(filter(createTestEntry({ category: 'db' }))).toBe(true);
		expect(filter(createTestEntry({ category: 'http' }))).toBe(true);
		expect(filter(createTestEntry({ category: 'db.pool' }))).toBe(false);
	});

	it('matches wildcard categories by prefix', () => {
		const filter = createTargetFilter({ categories: ['app.*'] });
		expect(filter(createTestEntry({ category: 'app.auth' }))).toBe(true);
		expect(filter(createTestEntry({ category: 'app.' }))).toBe(true);
		expect(filter(createTestEntry({ category: 'app' }))).toBe(false);
	});

	it('combines level and category', () => {
		const filter = createTargetFilter({ maxLevel: Level.Error, categories: ['db'] });
		expect(filter(createTestEntry({ level: Level.Error, category: 'db' }))).toBe(true);
		expect(filter(createTestEntry({ level: Level.Info, category: 'db' }))).toBe(false);
		expect(filter(createTestEntry({ level: Level.Error, category: 'http' }))).toBe(false);
	});
});
