import { assert, describe, test } from 'vitest';
import {
    getErrorMessage,
    isFileNotFoundError,
    parseIntWithDefault,
    parsePortainerUrl,
} from '../lib/util.js';

describe('getErrorMessage', () => {
    test('should return undefined for falsy values', () => {
        assert.isUndefined(getErrorMessage(null));
        assert.isUndefined(getErrorMessage(undefined));
        assert.isUndefined(getErrorMessage(false));
        assert.isUndefined(getErrorMessage(0));
        assert.isUndefined(getErrorMessage(''));
    });

    test('should return strings as they are', () => {
        assert.equal(getErrorMessage('error message'), 'error message');
    });

    test('should return the message of Error subclasses', () => {
        class CustomError extends Error {}
        assert.equal(getErrorMessage(new TypeError('type error')), 'type error');
        assert.equal(getErrorMessage(new CustomError('custom')), 'custom');
    });

    test('should return a string message property of plain objects', () => {
        assert.equal(getErrorMessage({ message: 'plain' }), 'plain');
        assert.isUndefined(getErrorMessage({ message: 42 }));
        assert.isUndefined(getErrorMessage({ code: 'E' }));
    });
});

describe('isFileNotFoundError', () => {
    test('should match only ENOENT', () => {
        assert.isTrue(isFileNotFoundError({ code: 'ENOENT' }));
        assert.isFalse(isFileNotFoundError({ code: 'EACCES' }));
        assert.isFalse(isFileNotFoundError(new Error('ENOENT')));
        assert.isFalse(isFileNotFoundError(null));
    });
});

describe('parseIntWithDefault', () => {
    test('should parse integers', () => {
        assert.equal(parseIntWithDefault('9443', 1), 9443);
        assert.equal(parseIntWithDefault('-1', 1), -1);
    });

    test('should fall back on undefined or unparsable input', () => {
        assert.equal(parseIntWithDefault(undefined, 7), 7);
        assert.equal(parseIntWithDefault('abc', 7), 7);
        assert.equal(parseIntWithDefault('', 7), 7);
    });
});

describe('parsePortainerUrl', () => {
    test('should split an https URL with a port', () => {
        assert.deepEqual(parsePortainerUrl('https://portainer.local:9443'), {
            protocol: 'https',
            host: 'portainer.local',
            port: 9443,
        });
    });

    test('should default the port by protocol', () => {
        assert.equal(parsePortainerUrl('http://portainer.local').port, 9000);
        assert.equal(parsePortainerUrl('https://portainer.local/').port, 9443);
    });

    test('should ignore any path and lowercase the scheme', () => {
        assert.deepEqual(parsePortainerUrl('HTTP://10.0.0.5:8000/api/'), {
            protocol: 'http',
            host: '10.0.0.5',
            port: 8000,
        });
    });

    test('should keep IPv6 hosts whole, with their port', () => {
        assert.deepEqual(parsePortainerUrl('http://[::1]:9443'), {
            protocol: 'http',
            host: '[::1]',
            port: 9443,
        });
        assert.deepEqual(parsePortainerUrl('https://[fd00::2]/'), {
            protocol: 'https',
            host: '[fd00::2]',
            port: 9443,
        });
    });

    test('should keep an explicit port equal to the scheme default', () => {
        assert.equal(parsePortainerUrl('http://portainer.local:80').port, 80);
        assert.equal(parsePortainerUrl('https://[::1]:443/').port, 443);
    });

    test('should reject other schemes', () => {
        assert.throws(
            () => parsePortainerUrl('tcp://portainer.local:9000'),
            'Invalid Portainer URL: tcp://portainer.local:9000. Must start with "http://" or "https://"',
        );
        assert.throws(() => parsePortainerUrl('portainer.local'), /Invalid Portainer URL/);
    });
});
