function wrapLine(line: string, width: number): string {
    if (line.length <= width) return line

    const lines: string[] = []
    let current = ''

    for (const word of line.split(' ')) {
        if (current === '') {
            current = word
        } else if (current.length + 1 + word.length <= width) {
            current += ` ${word}`
        } else {
            lines.push(current)
            current = word
        }
    }
    lines.push(current)

    return lines.join('\n')
}

/**
 * Reflow text to at most `width` columns for display. Breaks only at spaces;
 * a word longer than `width` gets a line of its own. Existing line breaks
 * are kept.
 */
export function wrapText(text: string, width = 100): string {
    return text
        .split('\n')
        .map((line) => wrapLine(line, Math.max(1, width)))
        .join('\n')
}
