/**
 * HTML Entity Encoder - Text Processing Utility
 *
 * @description
 * Escapes user-controlled text (file names) before it is written into the
 * HTML player page served by the link server.
 *
 * @module utils/escapeHtml
 *
 * @example
 * ```typescript
 * const safe = escapeHtml('<clip> "one" & two.mp4');
 * // Result: '&lt;clip&gt; &quot;one&quot; &amp; two.mp4'
 * ```
 */

/**
 * Encodes the characters that are significant in HTML text and attributes
 *
 * `&` is replaced first so the entities produced by later steps are not
 * encoded twice.
 */
function escapeHtml(text: string): string {
	return text
		.replace(/&/g, '&amp;')
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
		.replace(/"/g, '&quot;')
		.replace(/'/g, '&#39;');
}

/**
 * HTML entity encoder utilities
 */
const htmlEntityEncoder = {
	escapeHtml,
};

export default htmlEntityEncoder;

// Export individual functions for named imports
export { escapeHtml };
