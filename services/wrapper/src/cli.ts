/**
 * Command-line flags. The job itself always arrives on stdin.
 */

export interface CliArgs {
    command: 'run' | 'worker' | 'help' | 'version'
    unknown: string[]
}

export function parseArgs(args: string[]): CliArgs {
    const result: CliArgs = { command: 'run', unknown: [] }

    for (const arg of args) {
        if (arg === '--help' || arg === '-h') {
            result.command = 'help'
            continue
        }

        if (arg === '--version') {
            if (result.command !== 'help') result.command = 'version'
            continue
        }

        // Internal: detached half of the hand-off
        if (arg === '--worker') {
            if (result.command === 'run') result.command = 'worker'
            continue
        }

        result.unknown.push(arg)
    }

    return result
}

export function usage(name: string): string {
    return [
        `Usage: ${name} [--help] [--version]`,
        '',
        'Reads one JSON job description on stdin, prints the locations of the',
        'wrapper log, the conversion log and the state file as one JSON line,',
        'then runs virt-v2v in the background.',
        '',
        'Options:',
        '  -h, --help     Show this help and exit',
        '  --version      Print the version and exit',
        '',
    ].join('\n')
}
