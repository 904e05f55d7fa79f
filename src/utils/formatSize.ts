/**
 * Human-readable byte sizes for status and reply messages.
 *
 * @module utils/formatSize
 */

const KIB = 1024;
const MIB = KIB * 1024;
const GIB = MIB * 1024;

/**
 * Formats a byte count as B, KB, MB or GB with one decimal
 *
 * @example
 * formatFileSize(1536); // "1.5 KB"
 */
export function formatFileSize(sizeBytes: number): string {
	if (sizeBytes < KIB) {
		return `${sizeBytes} B`;
	}
	if (sizeBytes < MIB) {
		return `${(sizeBytes / KIB).toFixed(1)} KB`;
	}
	if (sizeBytes < GIB) {
		return `${(sizeBytes / MIB).toFixed(1)} MB`;
	}
	return `${(sizeBytes / GIB).toFixed(1)} GB`;
}
