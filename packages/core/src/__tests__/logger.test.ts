import { Level, MockErrorWriter, MockTarget } from '@relaylog/sdk';
import { ConsoleTarget } from '@relaylog/target-console';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { DispatchEngine, type EngineOptions } from '../engine.js';
import { FatalError } from '../errors.js';
import { defaultFormatter } from '../format.js';
import { Logger, createLogger } from '../logger.js';

async function makeLogger(options: EngineOptions = {}, category = 'app') {
	const target = new MockTarget();
	const engine = new DispatchEngine({ errorWriter: new MockErrorWriter(), targets: [target], ...options });
	await engine.open();
	return { logger: new Logger(engine, category), engine, target };
}

describe('Logger', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	// ─── Levels ───────────────────────────────────────────────────────────────

	it('logs only entries within the maximum level', async () => {
		const { logger, target } = await makeLogger({ maxLevel: Level.Warn });
		await logger.info('x');
		await logger.error('y');
		await logger.close();
		expect(target.messages).toEqual(['y']);
		expect(target.entries[0]?.level).toBe(Level.Error);
	});

	it('routes each method to its level', async () => {
		const { logger, target } = await makeLogger();
		await logger.error('e');
		await logger.warn('w');
		await logger.info('i');
		await logger.debug('d');
		await logger.log(Level.Warn, 'l');
		await logger.close();
		expect(target.entries.map((e) => [e.level, e.message])).toEqual([
			[Level.Error, 'e'],
			[Level.Warn, 'w'],
			[Level.Info, 'i'],
			[Level.Debug, 'd'],
			[Level.Warn, 'l'],
		]);
	});

	it('setLevel accepts names in any case', async () => {
		const { logger, engine, target } = await makeLogger();
		expect(logger.setLevel('WARN')).toBe(true);
		expect(engine.maxLevel).toBe(Level.Warn);
		await logger.info('hidden');
		await logger.warn('shown');
		await logger.close();
		expect(target.messages).toEqual(['shown']);
	});

	it('setLevel ignores unknown names', async () => {
		const { logger, engine } = await makeLogger({ maxLevel: Level.Info });
		expect(logger.setLevel('loud')).toBe(false);
		expect(engine.maxLevel).toBe(Level.Info);
		await logger.close();
	});

	// ─── Messages ─────────────────────────────────────────────────────────────

	it('concatenates positional arguments', async () => {
		const { logger, target } = await makeLogger();
		await logger.info('count', 3, 4, 'x', { a: 1 });
		await logger.close();
		expect(target.messages).toEqual(['count3 4x{ a: 1 }']);
	});

	it('expands templates', async () => {
		const { logger, target } = await makeLogger();
		await logger.infof('%s=%d', 'n', 42);
		await logger.warnf('100%');
		await logger.logf(Level.Error, '%s!', 'e');
		await logger.close();
		expect(target.messages).toEqual(['n=42', '100%', 'e!']);
		expect(target.entries[2]?.level).toBe(Level.Error);
	});

	it('formats entries with the normal formatter by default', async () => {
		const { logger, target } = await makeLogger();
		await logger.info('hello');
		await logger.close();
		expect(target.entries[0]?.formattedMessage).toMatch(
			/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\|Info\|app\|hello$/,
		);
	});

	it('appends the call stack starting at the caller', async () => {
		const { logger, target } = await makeLogger({ callStackDepth: 1 });
		await logger.warn('here');
		await logger.close();
		expect(target.entries[0]?.callStack).toMatch(/^\n.*logger\.test\.ts:\d+$/);
		expect(target.entries[0]?.formattedMessage.endsWith(target.entries[0]?.callStack ?? '')).toBe(true);
	});

	// ─── Derived loggers ──────────────────────────────────────────────────────

	it('getLogger shares the engine and formatter under a new category', async () => {
		const { engine, target } = await makeLogger();
		const root = new Logger(engine, 'app', defaultFormatter);
		const child = root.getLogger('db');
		expect(child.engine).toBe(engine);
		expect(child.category).toBe('db');
		expect(child.formatter).toBe(defaultFormatter);

		await child.info('query');
		await root.close();
		expect(target.entries[0]?.category).toBe('db');
		expect(target.entries[0]?.formattedMessage).toMatch(/\|Info\|db\|query$/);
	});

	it('getLogger can override the formatter', async () => {
		const { logger, target } = await makeLogger();
		const child = logger.getLogger('db', (l, e) => `${l.category}> ${e.message}`);
		await child.info('query');
		await logger.close();
		expect(target.entries[0]?.formattedMessage).toBe('db> query');
	});

	it('sync mode set on one logger applies to its siblings', async () => {
		const { logger, target } = await makeLogger();
		const sibling = logger.getLogger('worker');
		sibling.sync();

		void logger.info('a');
		void sibling.info('b');
		expect(target.messages).toEqual(['a', 'b']);

		logger.sync(false);
		await logger.close();
	});

	// ─── Fatal ────────────────────────────────────────────────────────────────

	it('rejects fatal calls with FatalError when the action is panic', async () => {
		const { logger, target } = await makeLogger();
		logger.setFatalAction('panic');
		await expect(logger.fatal('out of memory')).rejects.toBeInstanceOf(FatalError);
		await expect(logger.fatalf('%s', 'again')).rejects.toThrow('Fatal error: again');
		await logger.close();
		expect(target.messages).toEqual(['out of memory', 'again']);
	});

	it('exits through the engine hook when the action is exit', async () => {
		const exit = vi.fn();
		const { logger, target } = await makeLogger({ exit, fatalAction: 'exit' });
		await logger.fatal('bye');
		await logger.close();
		expect(exit).toHaveBeenCalledTimes(1);
		expect(exit).toHaveBeenCalledWith(1);
		expect(target.messages).toEqual(['bye', 'Forced to exit.']);
	});

	// ─── Targets ──────────────────────────────────────────────────────────────

	it('setTarget replaces the targets', async () => {
		const { logger, target } = await makeLogger();
		const replacement = new MockTarget('replacement');
		await logger.setTarget(replacement);
		await logger.info('later');
		await logger.close();
		expect(target.messages).toEqual([]);
		expect(replacement.messages).toEqual(['later']);
	});

	it('addTarget delivers to every target', async () => {
		const { logger, target } = await makeLogger();
		const extra = new MockTarget('extra');
		await logger.addTarget(extra);
		await logger.info('both');
		await logger.close();
		expect(target.messages).toEqual(['both']);
		expect(extra.messages).toEqual(['both']);
	});

	it('flush waits for queued entries', async () => {
		const { logger, target } = await makeLogger();
		target.pause();
		await logger.info('queued');
		setTimeout(() => target.resume(), 5);
		await logger.flush();
		expect(target.messages).toEqual(['queued']);
		expect(logger.engine.pending).toBe(0);
		await logger.close();
	});
});

describe('createLogger', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('returns an open logger writing to the console', async () => {
		const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
		const logger = await createLogger('svc');
		expect(logger.category).toBe('svc');
		expect(logger.engine.isOpen).toBe(true);
		expect(logger.engine.activeTargets).toHaveLength(1);
		expect(logger.engine.activeTargets[0]).toBeInstanceOf(ConsoleTarget);

		logger.sync();
		await logger.info('hi');
		await logger.close();

		expect(write).toHaveBeenCalledTimes(1);
		const line = String(write.mock.calls[0]?.[0]);
		expect(line).toContain('|Info|svc|hi');
		expect(line.endsWith('\n')).toBe(true);
	});

	it('uses the given options and targets', async () => {
		const target = new MockTarget();
		const logger = await createLogger('app', {
			errorWriter: new MockErrorWriter(),
			maxLevel: Level.Error,
			targets: [target],
		});
		await logger.warn('dropped');
		await logger.error('kept');
		await logger.close();
		expect(target.messages).toEqual(['kept']);
	});

	it('rejects invalid options', async () => {
		await expect(createLogger('app', { bufferSize: -5, targets: [new MockTarget()] })).rejects.toThrow(
			'bufferSize: must be an integer no less than 0',
		);
	});
});
