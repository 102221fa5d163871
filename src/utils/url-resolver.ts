/**
 * Joins a possibly relative reference onto the page URL it was found in.
 * Handles relative, root-relative, scheme-relative and absolute references.
 * Throws TypeError when either side cannot be parsed.
 */
export function resolveUrl(base: string, reference: string): string {
    return new URL(reference.trim(), base).href;
}
