/**
 * Split abstract text into sentences.
 * - Break after a period followed by whitespace, or on a blank line
 * - Trim each piece
 * - Drop pieces of `minLength` characters or fewer (headings like "Methods:")
 */
export function splitSentences(text: string, minLength = 10): string[] {
    if (!text) return [];

    return text
        .split(/(?<=\.)\s|\n\n/)
        .map((sentence) => sentence.trim())
        .filter((sentence) => sentence.length > minLength);
}
