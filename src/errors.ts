/** Stop and station offsets disagree with the scan direction: the pattern is not offset-sorted. */
export class DataIntegrityError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "DataIntegrityError";
    }
}

/** A weighted average was about to be divided by a zero trip total. */
export class AggregationInvariantError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "AggregationInvariantError";
    }
}

export class ConfigError extends Error {
    constructor(readonly variable: string, message: string) {
        super(`${variable}: ${message}`);
        this.name = "ConfigError";
    }
}
