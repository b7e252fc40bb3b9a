import readline from 'readline';
import chalk from 'chalk';
import { ValidationResult } from '../domain/configuration_validator';

let rl: readline.Interface | null = null;
let onInterrupt: (() => void) | null = null;
let streams: { input: NodeJS.ReadableStream; output: NodeJS.WritableStream } = {
    input: process.stdin,
    output: process.stdout,
};

function getRL(): readline.Interface {
    if (!rl) {
        const instance = readline.createInterface(streams);
        instance.on('SIGINT', () => {
            if (onInterrupt) onInterrupt();
        });
        // End of input (Ctrl+D) ends the run like Ctrl+C does; closePrompts() detaches first.
        instance.on('close', () => {
            if (rl !== instance) return;
            rl = null;
            if (onInterrupt) onInterrupt();
        });
        rl = instance;
    }
    return rl;
}

export function setInterruptHandler(handler: () => void): void {
    onInterrupt = handler;
}

/**
 * Replaces stdin/stdout for the next prompt session.
 */
export function setPromptStreams(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): void {
    closePrompts();
    streams = { input, output };
}

export function ask(question: string): Promise<string> {
    return new Promise((resolve) => {
        getRL().question(question, (answer) => resolve(answer.trim()));
    });
}

/**
 * Re-prompts until the check passes.
 */
export async function promptValid<T>(label: string, check: (raw: string) => ValidationResult<T>): Promise<T> {
    while (true) {
        const result = check(await ask(chalk.white(`  → ${label}: `)));
        if (result.ok) return result.value;
        for (const issue of result.issues) {
            console.log(chalk.yellow(`  ${issue}`));
        }
    }
}

export async function promptText(label: string): Promise<string> {
    return ask(chalk.white(`  → ${label}: `));
}

export async function promptNumber(label: string, min: number, max: number): Promise<number> {
    while (true) {
        const raw = await ask(chalk.white(`${label}: `));
        const value = Number(raw);
        if (raw === '' || !Number.isInteger(value)) {
            console.log(chalk.yellow('Invalid input. Please enter a numeric value.'));
        } else if (value < min || value > max) {
            console.log(chalk.yellow('Invalid selection. Please try again.'));
        } else {
            return value;
        }
    }
}

export async function promptYesNo(label: string): Promise<boolean> {
    const answer = await ask(chalk.white(`${label} (y/N): `));
    return answer.toLowerCase() === 'y';
}

export async function pause(label: string): Promise<void> {
    await ask(chalk.dim(label));
}

export function closePrompts(): void {
    if (rl) {
        rl.close();
        rl = null;
    }
}
