const BARE_ASCII = /^[A-Za-z0-9_./:@%+=,-]$/;
const BARE_UNICODE = /^[\p{L}\p{N}]$/u;

function isBare(char: string): boolean {
	if (BARE_ASCII.test(char)) return true;
	return (char.codePointAt(0) ?? 0) > 0x7f && BARE_UNICODE.test(char);
}

/**
 * Quote text for a shell-like command line.
 *
 * Text made only of safe characters is returned unchanged. Anything else is
 * wrapped in single quotes, with each embedded quote doubled: it's → 'it''s'.
 */
export function quoteShell(text: string): string {
	if (text.length > 0 && Array.from(text).every(isBare)) {
		return text;
	}
	return `'${text.replaceAll("'", "''")}'`;
}
