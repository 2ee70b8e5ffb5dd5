import {expect, test} from 'vitest';
import {createConcurrencyLimiter} from '../../src/core/limiter.js';

test('createConcurrencyLimiter never runs more tasks than allowed', async () => {
	const limit = createConcurrencyLimiter(2);
	let active = 0;
	let peak = 0;
	const order: number[] = [];

	await Promise.all(
		[1, 2, 3, 4, 5].map(async value =>
			limit(async () => {
				active++;
				peak = Math.max(peak, active);
				await new Promise(resolve => setTimeout(resolve, 5));
				order.push(value);
				active--;
				return value;
			}),
		),
	);

	expect(peak).toBe(2);
	expect(order).toHaveLength(5);
});

test('createConcurrencyLimiter releases its slot when a task throws', async () => {
	const limit = createConcurrencyLimiter(1);

	await expect(
		limit(async () => {
			throw new Error('failed read');
		}),
	).rejects.toThrow('failed read');
	await expect(limit(async () => 'next')).resolves.toBe('next');
});
