/**
 * Test Suite: Throttled Status Reporter
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ThrottledStatusReporter } from '@services/statusReporter';
import { LogEngine } from '@config/logger';

describe('ThrottledStatusReporter', () => {
	let now: number;
	let editor: ReturnType<typeof vi.fn>;
	let reporter: ThrottledStatusReporter;

	beforeEach(() => {
		now = 0;
		editor = vi.fn().mockResolvedValue(undefined);
		reporter = new ThrottledStatusReporter(editor, { minIntervalMs: 3000, now: () => now });
	});

	it('should drop updates inside the window after the message was sent', () => {
		now = 2999;
		reporter.update('⬇️ Downloading...');

		expect(editor).not.toHaveBeenCalled();
	});

	it('should apply updates spaced by the interval', () => {
		now = 3000;
		reporter.update('first');
		now = 4000;
		reporter.update('second');
		now = 6000;
		reporter.update('third');

		expect(editor.mock.calls).toEqual([['first', []], ['third', []]]);
	});

	it('should always deliver the final text with its actions', async () => {
		reporter.update('dropped');

		await reporter.finish('✅ done', [{ id: 'backup:sticker:1', label: 'Back up to GoFile' }]);

		expect(editor).toHaveBeenCalledTimes(1);
		expect(editor).toHaveBeenCalledWith('✅ done', [{ id: 'backup:sticker:1', label: 'Back up to GoFile' }]);
	});

	it('should default final actions to none', async () => {
		await reporter.finish('❌ failed');

		expect(editor).toHaveBeenCalledWith('❌ failed', []);
	});

	it('should log instead of throwing when the final edit fails', async () => {
		editor.mockRejectedValueOnce(new Error('Unknown Message'));

		await expect(reporter.finish('✅ done')).resolves.toBeUndefined();
		expect(LogEngine.warn).toHaveBeenCalledWith('Failed to deliver final status message:', 'Unknown Message');
	});

	it('should swallow failures of intermediate edits into the debug log', async () => {
		editor.mockRejectedValueOnce(new Error('rate limited'));
		now = 5000;

		reporter.update('progress');
		await vi.waitFor(() => {
			expect(LogEngine.debug).toHaveBeenCalledWith('Status message edit failed:', 'rate limited');
		});
	});
});
