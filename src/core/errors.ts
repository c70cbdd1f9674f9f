export type GrowJournalErrorKind =
    | "InvalidTransition"
    | "UnknownPhase"
    | "OutOfRange"
    | "NotFound"
    | "InvalidConfig";

/**
 * Base for every error the integration surfaces to the host.
 * Each one is scoped to a single service invocation.
 */
export class GrowJournalError extends Error {
    public readonly kind: GrowJournalErrorKind;

    constructor(kind: GrowJournalErrorKind, message: string) {
        super(message);
        this.kind = kind;
        this.name = `${kind}Error`;
    }
}

export class InvalidTransitionError extends GrowJournalError {
    constructor(message: string) {
        super("InvalidTransition", message);
    }
}

export class UnknownPhaseError extends GrowJournalError {
    public readonly phase: string;

    constructor(phase: string) {
        super("UnknownPhase", `Unknown grow phase "${phase}"`);
        this.phase = phase;
    }
}

export class OutOfRangeError extends GrowJournalError {
    public readonly min: number;
    public readonly max: number;
    public readonly actual: number;

    constructor(label: string, actual: number, min: number, max: number) {
        super("OutOfRange", `${label} must be between ${min} and ${max}, got ${actual}`);
        this.min = min;
        this.max = max;
        this.actual = actual;
    }
}

export class NotFoundError extends GrowJournalError {
    constructor(what: string, id: string) {
        super("NotFound", `${what} "${id}" not found`);
    }
}

export class InvalidConfigError extends GrowJournalError {
    constructor(message: string) {
        super("InvalidConfig", message);
    }
}

export function isGrowJournalError(err: unknown): err is GrowJournalError {
    return err instanceof GrowJournalError;
}
