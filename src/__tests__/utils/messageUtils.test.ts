/**
 * Test Suite: Message Utilities
 */

import { describe, it, expect, vi } from 'vitest';
import { ButtonStyle } from 'discord.js';
import { buildActionRows, createMessageEditor } from '@utils/messageUtils';

describe('messageUtils', () => {
	describe('buildActionRows', () => {
		it('should turn actions into secondary buttons on one row', () => {
			const rows = buildActionRows([{ id: 'backup:sticker:1', label: 'Back up to GoFile' }]);

			expect(rows).toHaveLength(1);
			expect(rows[0].toJSON().components).toEqual([
				{ type: 2, custom_id: 'backup:sticker:1', label: 'Back up to GoFile', style: ButtonStyle.Secondary },
			]);
		});

		it('should return no rows without actions', () => {
			expect(buildActionRows([])).toEqual([]);
		});

		it('should drop actions whose id Discord would reject', () => {
			expect(buildActionRows([{ id: 'x'.repeat(101), label: 'Too long' }])).toEqual([]);
		});
	});

	describe('createMessageEditor', () => {
		it('should edit content and replace components', async () => {
			const message = { edit: vi.fn().mockResolvedValue(undefined) };
			const editor = createMessageEditor(message);

			await editor('done', []);

			expect(message.edit).toHaveBeenCalledWith({ content: 'done', components: [] });
		});
	});
});
