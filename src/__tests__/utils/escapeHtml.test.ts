/**
 * Test Suite: HTML Entity Encoder Utility
 */

import { describe, it, expect } from 'vitest';
import { escapeHtml } from '@utils/escapeHtml';
import htmlEntityEncoder from '@utils/escapeHtml';

describe('escapeHtml', () => {
	it('should encode markup characters', () => {
		expect(escapeHtml('<script>alert("x")</script>'))
			.toBe('&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;');
	});

	it('should encode ampersands exactly once', () => {
		expect(escapeHtml('Tom & Jerry &amp; friends')).toBe('Tom &amp; Jerry &amp;amp; friends');
	});

	it('should encode single quotes', () => {
		expect(escapeHtml("it's.mp4")).toBe('it&#39;s.mp4');
	});

	it('should leave plain names untouched', () => {
		expect(escapeHtml('holiday_2026.mp4')).toBe('holiday_2026.mp4');
	});

	it('should expose the same function on the default export', () => {
		expect(htmlEntityEncoder.escapeHtml).toBe(escapeHtml);
	});
});
