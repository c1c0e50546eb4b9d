import { describe, it, expect } from 'vitest';
import { computeDivergence, divergenceIndex } from '../src/core/divergence.js';
import { Log } from '../src/core/log.js';
import { msg } from './helpers.js';

describe('divergence', () => {
	const a = msg('user', 'A', 0);
	const b = msg('assistant', 'B', 1);
	const c = msg('user', 'C', 2);
	const x = msg('assistant', 'X', 3);

	describe('divergenceIndex()', () => {
		it('should be null for equal logs', () => {
			expect(divergenceIndex(new Log([a, b]), new Log([a, b]))).toBeNull();
			expect(divergenceIndex(new Log(), new Log())).toBeNull();
		});

		it('should be the length of a strict prefix', () => {
			expect(divergenceIndex(new Log([a, b, c]), new Log([a, b]))).toBe(2);
			expect(divergenceIndex(new Log(), new Log([a]))).toBe(0);
		});

		it('should be the first differing position', () => {
			expect(divergenceIndex(new Log([a, b, c]), new Log([a, x]))).toBe(1);
		});
	});

	describe('computeDivergence()', () => {
		it('should show extra messages on the current side as additions', () => {
			expect(computeDivergence(new Log([a, b, c]), new Log([a, b]))).toBe('+ user: C');
		});

		it('should show extra messages on the other side as removals', () => {
			expect(computeDivergence(new Log([a, b]), new Log([a, b, c]))).toBe('- user: C');
		});

		it('should list current tails before other tails', () => {
			expect(computeDivergence(new Log([a, b, c]), new Log([a, x]))).toBe(
				'+ assistant: B\n+ user: C\n- assistant: X',
			);
		});

		it('should be null when nothing differs', () => {
			expect(computeDivergence(new Log([a, b]), new Log([a, b]))).toBeNull();
			expect(computeDivergence(new Log(), new Log())).toBeNull();
		});

		it('should treat a timestamp change as a difference', () => {
			const moved = msg('assistant', 'B', 9);

			expect(computeDivergence(new Log([a, b]), new Log([a, moved]))).toBe('+ assistant: B\n- assistant: B');
		});
	});
});
