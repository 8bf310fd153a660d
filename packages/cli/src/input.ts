export interface QueryInput {
    stdinIsTTY: boolean
    readStdin(): Promise<string>
    /** Prompt shown before reading from a terminal */
    hint(text: string): void
}

export const STDIN_HINT = 'Enter your prompt. Finish with Ctrl-D.\n\n'

/**
 * The question to ask: the positional argument, else stdin when forced or
 * piped, else whatever is typed at the terminal until EOF. `null` when all
 * of those are blank.
 */
export async function resolveQuery(question: string, forceStdin: boolean, input: QueryInput): Promise<string | null> {
    if (question.trim() !== '') return question

    if (forceStdin || !input.stdinIsTTY) {
        if (forceStdin && input.stdinIsTTY) input.hint(STDIN_HINT)
        const piped = (await input.readStdin()).trim()
        if (piped !== '') return piped
    }

    if (input.stdinIsTTY) {
        input.hint(STDIN_HINT)
        const typed = (await input.readStdin()).trim()
        if (typed !== '') return typed
    }

    return null
}
