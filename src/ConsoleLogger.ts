import type { ILogger } from "./interfaces/ILogger";
import { SecretRedactor } from "./utils/SecretRedactor";

export class ConsoleLogger implements ILogger {
    private knownSecrets: string[];

    constructor(knownSecrets: readonly string[] = []) {
        this.knownSecrets = [...knownSecrets];
    }

    /** Masks `secret` in every later message. */
    registerSecret(secret: string | undefined): void {
        if (secret) this.knownSecrets.push(secret);
    }

    log(message: string): void {
        console.log(this.redact(message));
    }

    warn(message: string, error?: unknown): void {
        if (error === undefined) {
            console.warn(this.redact(message));
        } else {
            console.warn(this.redact(message), this.redact(describeError(error)));
        }
    }

    error(message: string, error?: unknown): void {
        if (error === undefined) {
            console.error(this.redact(message));
        } else {
            console.error(this.redact(message), this.redact(describeError(error)));
        }
    }

    private redact(text: string): string {
        return SecretRedactor.redact(text, this.knownSecrets);
    }
}

export function describeError(error: unknown): string {
    if (typeof error === "string") return error;
    if (error instanceof Error) {
        const cause = error.cause instanceof Error ? ` (caused by: ${error.cause.message})` : "";
        return `${error.message}${cause}`;
    }
    return JSON.stringify(error);
}
