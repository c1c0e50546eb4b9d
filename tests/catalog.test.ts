import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, symlinkSync, realpathSync, utimesSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
	formatConversationMeta,
	getConversations,
	isTestConversation,
	listConversations,
	type ConversationMeta,
} from '../src/core/catalog.js';
import { ChatConfig } from '../src/core/chat-config.js';
import { Log } from '../src/core/log.js';
import { makeTestDir, msg } from './helpers.js';

describe('catalog', () => {
	let testDir: string;

	beforeEach(() => {
		testDir = makeTestDir('catalog-test');
	});

	afterEach(() => {
		if (existsSync(testDir)) {
			rmSync(testDir, { recursive: true, force: true });
		}
	});

	/** Write a conversation whose main log was last modified at `mtime` (epoch seconds). */
	function store(id: string, log: Log, mtime: number, branches: string[] = []): string {
		const logdir = join(testDir, id);
		mkdirSync(join(logdir, 'branches'), { recursive: true });
		for (const branch of branches) {
			log.writeJsonl(join(logdir, 'branches', `${branch}.jsonl`));
		}
		const path = join(logdir, 'conversation.jsonl');
		log.writeJsonl(path);
		utimesSync(path, mtime, mtime);
		return logdir;
	}

	const a = msg('user', 'A', 0);
	const b = msg('assistant', 'B', 1);

	describe('getConversations()', () => {
		it('should describe each stored conversation', () => {
			store('planning', new Log([a, b]), 1_700_000_000, ['alt', 'main-undo-0']);

			const [meta] = [...getConversations(testDir)];

			expect(meta).toEqual({
				id: 'planning',
				name: 'planning',
				path: join(testDir, 'planning', 'conversation.jsonl'),
				created: Date.UTC(2024, 0, 1, 12),
				modified: 1_700_000_000_000,
				messages: 2,
				branches: 3,
				workspace: '',
			});
		});

		it('should order by modification time, newest first', () => {
			store('older', new Log([a]), 1_700_000_000);
			store('newer', new Log([a]), 1_700_000_500);
			store('middle', new Log([a]), 1_700_000_250);

			expect([...getConversations(testDir)].map((meta) => meta.id)).toEqual(['newer', 'middle', 'older']);
		});

		it('should fall back to the modification time for empty logs', () => {
			store('blank', new Log(), 1_700_000_000);

			const [meta] = [...getConversations(testDir)];

			expect(meta.created).toBe(1_700_000_000_000);
			expect(meta.messages).toBe(0);
		});

		it('should skip directories without a main log', () => {
			mkdirSync(join(testDir, 'stray'));
			writeFileSync(join(testDir, 'loose-file.txt'), 'x');

			expect([...getConversations(testDir)]).toEqual([]);
		});

		it('should yield nothing for a missing logs root', () => {
			expect([...getConversations(join(testDir, 'nowhere'))]).toEqual([]);
		});

		it('should use the configured name and workspace', () => {
			const logdir = store('named', new Log([a]), 1_700_000_000);
			const config = ChatConfig.fromLogdir(logdir);
			config.setName('Release checklist');
			config.setWorkspace('/srv/project');

			const [meta] = [...getConversations(testDir)];

			expect(meta.name).toBe('Release checklist');
			expect(meta.workspace).toBe('/srv/project');
		});

		it('should resolve the workspace link when nothing is configured', () => {
			const logdir = store('linked', new Log([a]), 1_700_000_000);
			const workspace = join(testDir, 'project');
			mkdirSync(workspace);
			symlinkSync(workspace, join(logdir, 'workspace'));

			const [meta] = [...getConversations(testDir)].filter((m) => m.id === 'linked');

			expect(meta.workspace).toBe(realpathSync(workspace));
		});
	});

	describe('isTestConversation()', () => {
		it('should recognise ids made by tests and evals', () => {
			expect(isTestConversation('tmpa1b2c3')).toBe(true);
			expect(isTestConversation('test-login-flow')).toBe(true);
			expect(isTestConversation('2024-01-01-evals-basic')).toBe(true);
			expect(isTestConversation('release-notes')).toBe(false);
		});
	});

	describe('listConversations()', () => {
		beforeEach(() => {
			store('tmp123', new Log([a]), 1_700_000_400);
			store('test-one', new Log([a]), 1_700_000_300);
			store('notes', new Log([a]), 1_700_000_200);
			store('ideas', new Log([a]), 1_700_000_100);
		});

		it('should leave out test conversations by default', () => {
			const ids = listConversations({ logsDir: testDir }).map((meta) => meta.id);

			expect(ids).toEqual(['notes', 'ideas']);
		});

		it('should include test conversations on request', () => {
			const ids = listConversations({ logsDir: testDir, includeTest: true }).map((meta) => meta.id);

			expect(ids).toEqual(['tmp123', 'test-one', 'notes', 'ideas']);
		});

		it('should stop at the limit', () => {
			const ids = listConversations({ logsDir: testDir, includeTest: true, limit: 2 }).map((meta) => meta.id);

			expect(ids).toEqual(['tmp123', 'test-one']);
		});
	});

	describe('formatConversationMeta()', () => {
		const meta: ConversationMeta = {
			id: 'notes',
			name: 'Meeting notes',
			path: '/logs/notes/conversation.jsonl',
			created: Date.UTC(2024, 0, 1, 12),
			modified: Date.UTC(2024, 0, 2, 9, 30),
			messages: 4,
			branches: 1,
			workspace: '',
		};

		it('should show name and id', () => {
			expect(formatConversationMeta(meta)).toBe('Meeting notes (id: notes)');
		});

		it('should add metadata on request', () => {
			expect(formatConversationMeta(meta, true)).toBe(
				'Meeting notes (id: notes)\n' +
					'Messages: 4\n' +
					'Created:  2024-01-01T12:00:00.000Z\n' +
					'Modified: 2024-01-02T09:30:00.000Z',
			);
		});

		it('should mention extra branches', () => {
			expect(formatConversationMeta({ ...meta, branches: 3 }, true).split('\n').at(-1)).toBe('(3 branches)');
		});
	});
});
