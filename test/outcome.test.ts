import { assert, describe, test } from 'vitest';
import {
    NotFoundError,
    ServerRejectionError,
    UnexpectedResponseError,
} from '../lib/errors.js';
import {
    describeOutcome,
    expectJSON,
    isNotFound,
    isSuccess,
    rejectionError,
    type Outcome,
} from '../lib/outcome.js';

const json: Outcome<{ Id: string }> = {
    kind: 'json',
    status: 200,
    data: { Id: 'c1' },
};
const missing: Outcome = {
    kind: 'failure',
    status: 404,
    message: 'No such container: c1',
};

describe('outcome helpers', () => {
    test('should tell failures from successes', () => {
        assert.isTrue(isSuccess(json));
        assert.isTrue(isSuccess({ kind: 'empty', status: 204 }));
        assert.isFalse(isSuccess(missing));
        assert.isTrue(isNotFound(missing));
        assert.isFalse(isNotFound({ kind: 'failure', status: 409, message: 'conflict' }));
    });

    test('should map 404 to NotFoundError and other statuses to ServerRejectionError', () => {
        const notFound = rejectionError({ kind: 'failure', status: 404, message: 'gone' });
        const conflict = rejectionError({ kind: 'failure', status: 409, message: 'busy' });

        assert.instanceOf(notFound, NotFoundError);
        assert.equal(notFound.statusCode, 404);
        assert.notInstanceOf(conflict, NotFoundError);
        assert.instanceOf(conflict, ServerRejectionError);
        assert.equal(conflict.statusCode, 409);
        assert.equal(conflict.message, 'busy');
    });

    test('should unwrap JSON data', () => {
        assert.deepEqual(expectJSON(json), { Id: 'c1' });
    });

    test('should throw for anything but JSON', () => {
        assert.throws(() => expectJSON(missing), NotFoundError, 'No such container: c1');
        assert.throws(
            () => expectJSON({ kind: 'text', status: 200, text: 'OK' }),
            UnexpectedResponseError,
            'Expected a JSON response but received text: OK',
        );
        assert.throws(
            () => expectJSON({ kind: 'empty', status: 204 }),
            UnexpectedResponseError,
            'Expected a JSON response but received an empty body',
        );
    });

    test('should describe outcomes', () => {
        assert.equal(describeOutcome(json), 'Successfully executed action');
        assert.equal(
            describeOutcome(missing),
            'Failed executing action because No such container: c1',
        );
    });
});
