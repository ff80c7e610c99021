/**
 * Raised when a call to the test management service fails outright. The
 * batch being published is abandoned; retrying is left to the caller.
 */
export class RemoteServiceError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = "RemoteServiceError";
    }
}
