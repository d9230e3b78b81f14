export class InvalidArgument extends Error {
    constructor(message?: string) {
        const trueProto = new.target.prototype;
        super(message);

        Object.setPrototypeOf(this, trueProto);
        this.name = new.target.name;
    }
}

/**
 * Raised by the REST caller for any response it cannot turn into a result.
 * `status` is 0 when the request never reached the server.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly code?: number
    ) {
        const trueProto = new.target.prototype;
        super(message);

        Object.setPrototypeOf(this, trueProto);
        this.name = new.target.name;
    }
}

export class AuthenticationError extends ApiError {
    constructor(message: string = "Invalid token") {
        super(message, 401);
    }
}

export class RateLimitError extends ApiError {
    constructor(
        public readonly retryAfterSeconds: number
    ) {
        super(`Rate limited. Retry after ${retryAfterSeconds} seconds`, 429);
    }
}
