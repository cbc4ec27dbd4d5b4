/**
 * Per-target entry filtering by level and category.
 */

import { type Entry, Level } from './types.js';

export interface TargetFilterOptions {
	/** Most verbose level the target accepts (default: Debug) */
	maxLevel?: Level;
	/**
	 * Categories the target accepts. An entry matches a category exactly,
	 * or a pattern ending in `*` by prefix. Empty or absent accepts all.
	 */
	categories?: readonly string[];
}

export type TargetFilter = (entry: Entry) => boolean;

export function createTargetFilter(options: TargetFilterOptions = {}): TargetFilter {
	const maxLevel = options.maxLevel ?? Level.Debug;
	const exact = new Set<string>();
	const prefixes: string[] = [];
	for (const category of options.categories ?? []) {
		if (category.endsWith('*')) prefixes.push(category.slice(0, -1));
		else exact.add(category);
	}
	const anyCategory = exact.size === 0 && prefixes.length === 0;

	return (entry) => {
		if (entry.level > maxLevel) return false;
		if (anyCategory || exact.has(entry.category)) return true;
		return prefixes.some((prefix) => entry.category.startsWith(prefix));
	};
}
