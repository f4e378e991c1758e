import {
    NotFoundError,
    ServerRejectionError,
    UnexpectedResponseError,
} from './errors.js';

export interface JSONOutcome<T> {
    kind: 'json';
    status: number;
    data: T;
}

export interface TextOutcome {
    kind: 'text';
    status: number;
    text: string;
}

export interface EmptyOutcome {
    kind: 'empty';
    status: number;
}

export interface FailureOutcome {
    kind: 'failure';
    status: number;
    message: string;
}

/**
 * Outcome is what every request resolves to once a round trip completed.
 * 4xx/5xx responses are `failure` values, never thrown.
 */
export type Outcome<T = unknown> =
    | JSONOutcome<T>
    | TextOutcome
    | EmptyOutcome
    | FailureOutcome;

export function isSuccess<T>(
    outcome: Outcome<T>,
): outcome is JSONOutcome<T> | TextOutcome | EmptyOutcome {
    return outcome.kind !== 'failure';
}

export function isNotFound(outcome: Outcome<unknown>): boolean {
    return outcome.kind === 'failure' && outcome.status === 404;
}

// Turn a failure outcome into the error a caller that needs a value should throw
export function rejectionError(outcome: FailureOutcome): ServerRejectionError {
    if (outcome.status === 404) {
        return new NotFoundError(outcome.message);
    }
    return new ServerRejectionError(outcome.message, outcome.status);
}

export function expectJSON<T>(outcome: Outcome<T>): T {
    switch (outcome.kind) {
        case 'json':
            return outcome.data;
        case 'failure':
            throw rejectionError(outcome);
        case 'text':
            throw new UnexpectedResponseError(
                `Expected a JSON response but received text: ${outcome.text}`,
                outcome.status,
            );
        case 'empty':
            throw new UnexpectedResponseError(
                'Expected a JSON response but received an empty body',
                outcome.status,
            );
    }
}

export function describeOutcome(outcome: Outcome<unknown>): string {
    if (outcome.kind === 'failure') {
        return `Failed executing action because ${outcome.message}`;
    }
    return 'Successfully executed action';
}
