/**
 * GSOD Records — Error Taxonomy
 *
 * Every parse failure is local to one record and carries the offending raw
 * input. Parsers throw immediately; callers decide whether to skip or abort.
 */

export class GsodParseError extends Error {
    /** Raw token, cell, or line that failed */
    readonly input: string;

    constructor(message: string, input: string) {
        super(message);
        this.name = 'GsodParseError';
        this.input = input;
    }
}

/** Empty or duplicate derived key in the station-directory header */
export class MalformedHeaderError extends GsodParseError {
    constructor(message: string, input: string) {
        super(message, input);
        this.name = 'MalformedHeaderError';
    }
}

/** Row (or archive line) has fewer cells than the schema needs */
export class RowArityError extends GsodParseError {
    readonly expected: number;
    readonly actual: number;

    constructor(expected: number, actual: number, input: string) {
        super(`Expected at least ${expected} cells, got ${actual}`, input);
        this.name = 'RowArityError';
        this.expected = expected;
        this.actual = actual;
    }
}

export class DateParseError extends GsodParseError {
    constructor(input: string) {
        super(`Invalid YYYYMMDD date: '${input}'`, input);
        this.name = 'DateParseError';
    }
}

export class NumericParseError extends GsodParseError {
    readonly field: string;

    constructor(field: string, input: string) {
        super(`Invalid decimal for '${field}': '${input}'`, input);
        this.name = 'NumericParseError';
        this.field = field;
    }
}

export class MalformedIndicatorError extends GsodParseError {
    constructor(input: string) {
        super(`Indicator token must be 6 characters of 0/1, got '${input}'`, input);
        this.name = 'MalformedIndicatorError';
    }
}

/** Station directory could not be found at the configured locator */
export class ArchiveNotFoundError extends Error {
    readonly key: string;

    constructor(key: string) {
        super(`Archive not found: ${key}`);
        this.name = 'ArchiveNotFoundError';
        this.key = key;
    }
}
