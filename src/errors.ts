export class StackCollapseError extends Error {
    constructor(message: string, public readonly exitCode: number = 1) {
        super(message);
        this.name = new.target.name;
    }
}

// Bad command line, conflicting options, or a host tool that cannot be found.
export class ConfigurationError extends StackCollapseError {
    constructor(message: string) {
        super(message, 2);
    }
}

export class SessionNotFoundError extends StackCollapseError {
    constructor(public readonly path: string, reason?: string) {
        super(`Cannot read profiling session "${path}"${reason ? `: ${reason}` : ""}`, 3);
    }
}

export class MalformedSessionError extends StackCollapseError {
    constructor(message: string) {
        super(message, 4);
    }
}

export class UnknownEventTypeError extends StackCollapseError {
    constructor(public readonly eventType: string, public readonly available: string[]) {
        super(`Event type "${eventType}" not found in the session. Available event types: ${available.length ? available.join(", ") : "(none)"}`, 5);
    }
}
