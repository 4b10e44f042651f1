/** A workflow definition is malformed or inconsistent. Raised before any side effect. */
export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

/** A workflow, agent or template reference does not resolve for the caller. */
export class NotFoundError extends Error {
    constructor(
        public readonly resource: string,
        public readonly id: string,
    ) {
        super(`${resource} ${id} not found`);
        this.name = 'NotFoundError';
    }
}
