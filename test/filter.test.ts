import { assert, describe, test } from 'vitest';
import { Filter, convertFilters } from '../lib/filter.js';

describe('Filter', () => {
    test('should serialize a single key with a single value', () => {
        const filter = new Filter();
        filter.add('status', 'running');

        assert.deepEqual(filter.toJSON(), { status: ['running'] });
    });

    test('should accumulate values added under the same key', () => {
        const filter = new Filter();
        filter.add('label', 'tier=front');
        filter.add('label', 'env');
        filter.add('status', 'exited');

        assert.deepEqual(filter.toJSON(), {
            label: ['tier=front', 'env'],
            status: ['exited'],
        });
    });

    test('should render booleans and numbers as strings', () => {
        const filter = new Filter();
        filter.add('dangling', true);
        filter.add('exited', 137);
        filter.set('healthy', [false]);

        assert.equal(
            filter.toURLParameter(),
            '{"dangling":["true"],"exited":["137"],"healthy":["false"]}',
        );
    });

    test('should replace values on set', () => {
        const filter = new Filter();
        filter.add('name', 'web');

        filter.set('name', ['db', 'cache']);

        assert.deepEqual(filter.get('name'), ['db', 'cache']);
    });

    test('should return copies from get and toJSON', () => {
        const filter = new Filter();
        filter.add('name', 'web');

        filter.get('name').push('mutated');
        const json = filter.toJSON();
        json['name']?.push('mutated');

        assert.deepEqual(filter.get('name'), ['web']);
    });

    test('should report keys and membership', () => {
        const filter = new Filter();
        filter.add('status', 'running');

        assert.isTrue(filter.has('status'));
        assert.isFalse(filter.has('label'));
        assert.deepEqual(filter.keys(), ['status']);
        assert.deepEqual(filter.get('label'), []);
    });

    test('should build from a plain object, wrapping scalars in lists', () => {
        const filter = Filter.from({
            status: 'running',
            label: ['a=b', 'c'],
            exited: 0,
        });

        assert.deepEqual(filter.toJSON(), {
            status: ['running'],
            label: ['a=b', 'c'],
            exited: ['0'],
        });
    });
});

describe('convertFilters', () => {
    test('should encode a plain object as a JSON query value', () => {
        assert.equal(
            convertFilters({ status: 'running', label: ['a=b', 'c'] }),
            '{"status":["running"],"label":["a=b","c"]}',
        );
    });

    test('should encode an empty object as an empty JSON object', () => {
        assert.equal(convertFilters({}), '{}');
    });
});
