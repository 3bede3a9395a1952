export interface MissingResult {
    candidateId: string;
    candidateName: string;
}

export class IncompleteDataError extends Error {
    constructor(public readonly raceId: string, public readonly missing: MissingResult[]) {
        super(`Race ${raceId} has no results entered for: ${missing.map((m) => m.candidateName).join(", ")}`);
        this.name = "IncompleteDataError";
    }
}

export class InvalidResultError extends Error {
    constructor(public readonly raceId: string, message: string) {
        super(`Race ${raceId}: ${message}`);
        this.name = "InvalidResultError";
    }
}

export class NotFoundError extends Error {
    constructor(public readonly kind: string, public readonly id: string) {
        super(`${kind} ${id} not found`);
        this.name = "NotFoundError";
    }
}

export class ConfirmationRequiredError extends Error {
    constructor(public readonly target: string) {
        super(`Refusing to delete ${target} without confirmation`);
        this.name = "ConfirmationRequiredError";
    }
}

export class EntryFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "EntryFormatError";
    }
}

/** Errors whose message is safe to show back to the user in a reply. */
export function isUserFacingError(err: unknown): err is Error {
    return (
        err instanceof IncompleteDataError ||
        err instanceof InvalidResultError ||
        err instanceof NotFoundError ||
        err instanceof ConfirmationRequiredError ||
        err instanceof EntryFormatError
    );
}
