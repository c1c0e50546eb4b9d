import { describe, it, expect } from 'vitest';
import {
	createMessage,
	formatMessage,
	isCommand,
	messagesEqual,
	messageToRecord,
} from '../src/core/message.js';
import { msg } from './helpers.js';

describe('message', () => {
	describe('createMessage()', () => {
		it('should fill defaults', () => {
			const message = createMessage('user', 'hello');

			expect(message.role).toBe('user');
			expect(message.content).toBe('hello');
			expect(message.timestamp).toBeInstanceOf(Date);
			expect(message.files).toEqual([]);
			expect(message.pinned).toBeUndefined();
			expect(message.hide).toBeUndefined();
			expect(message.quiet).toBeUndefined();
			expect(message.extra).toBeUndefined();
		});

		it('should copy the files array', () => {
			const files = ['a.txt'];
			const message = createMessage('user', 'hello', { files });
			files.push('b.txt');

			expect(message.files).toEqual(['a.txt']);
		});

		it('should return a frozen message', () => {
			const message = createMessage('user', 'hello', { files: ['a.txt'], extra: { call_id: 'c1' } });

			expect(Object.isFrozen(message)).toBe(true);
			expect(Object.isFrozen(message.files)).toBe(true);
			expect(Object.isFrozen(message.extra)).toBe(true);
		});

		it('should only set flags that are true', () => {
			const message = createMessage('assistant', 'hi', { pinned: false, quiet: true });

			expect('pinned' in message).toBe(false);
			expect(message.quiet).toBe(true);
		});
	});

	describe('messagesEqual()', () => {
		it('should compare by value', () => {
			expect(messagesEqual(msg('user', 'A'), msg('user', 'A'))).toBe(true);
		});

		it('should compare timestamps by instant', () => {
			expect(messagesEqual(msg('user', 'A', 0), msg('user', 'A', 1))).toBe(false);
		});

		it('should treat an absent flag as false', () => {
			const a = msg('user', 'A');
			const b = { ...msg('user', 'A'), pinned: false };

			expect(messagesEqual(a, b)).toBe(true);
		});

		it('should compare files in order', () => {
			const a = msg('user', 'A', 0, { files: ['x', 'y'] });
			const b = msg('user', 'A', 0, { files: ['y', 'x'] });

			expect(messagesEqual(a, b)).toBe(false);
		});

		it('should compare extra fields deeply', () => {
			const a = msg('user', 'A', 0, { extra: { meta: { n: 1 } } });
			const b = msg('user', 'A', 0, { extra: { meta: { n: 1 } } });
			const c = msg('user', 'A', 0, { extra: { meta: { n: 2 } } });

			expect(messagesEqual(a, b)).toBe(true);
			expect(messagesEqual(a, c)).toBe(false);
		});

		it('should treat an absent message as unequal to a present one', () => {
			expect(messagesEqual(msg('user', 'A'), undefined)).toBe(false);
			expect(messagesEqual(undefined, undefined)).toBe(true);
		});
	});

	describe('formatMessage()', () => {
		it('should render role and content', () => {
			expect(formatMessage(msg('assistant', 'Hi there'))).toBe('assistant: Hi there');
		});
	});

	describe('isCommand()', () => {
		it('should detect the command prefix', () => {
			expect(isCommand(msg('user', '/undo'))).toBe(true);
			expect(isCommand(msg('user', 'not /a command'))).toBe(false);
		});
	});

	describe('messageToRecord()', () => {
		it('should produce the stored shape', () => {
			const record = messageToRecord(msg('user', 'hi', 0, { files: ['notes.md'] }));

			expect(record).toEqual({
				role: 'user',
				content: 'hi',
				timestamp: '2024-01-01T12:00:00.000Z',
				files: ['notes.md'],
			});
		});

		it('should write flags only when set', () => {
			const record = messageToRecord(msg('system', 'ctx', 0, { hide: true, quiet: true }));

			expect(record.hide).toBe(true);
			expect(record.quiet).toBe(true);
			expect('pinned' in record).toBe(false);
		});

		it('should carry extra fields without letting them shadow known ones', () => {
			const record = messageToRecord(msg('user', 'hi', 0, { extra: { call_id: 'c1', role: 'system' } }));

			expect(record.call_id).toBe('c1');
			expect(record.role).toBe('user');
		});
	});
});
