import test from 'node:test';
import assert from 'node:assert/strict';

import { SchemaValidator, JsonSchema, formatValidationErrors } from '../src/schema_validator';

const PORT_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['name', 'direction', 'width'],
    properties: {
        name: { type: 'string', pattern: '^[A-Za-z_][A-Za-z0-9_$]*$' },
        direction: { type: 'string', enum: ['input', 'output', 'inout'] },
        width: { type: 'integer', minimum: 1 },
    },
};

const MODULE_LIST_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['modules'],
    properties: {
        modules: {
            type: 'array',
            minItems: 1,
            items: {
                type: 'object',
                required: ['name', 'ports'],
                properties: {
                    name: { type: 'string', minLength: 1 },
                    ports: { type: 'array', items: PORT_SCHEMA },
                },
            },
        },
    },
};

function validator(): SchemaValidator {
    const v = new SchemaValidator();
    v.registerSchema('port_v1', PORT_SCHEMA);
    v.registerSchema('modules_v1', MODULE_LIST_SCHEMA);
    return v;
}

test('port schema accepts a well-formed port', () => {
    const r = validator().validate({ name: 'sum', direction: 'output', width: 1 }, 'port_v1');
    assert.equal(r.valid, true);
    assert.deepEqual(r.errors, []);
});

test('port schema rejects a bad direction enum', () => {
    const r = validator().validate({ name: 'a', direction: 'sideways', width: 1 }, 'port_v1');
    assert.equal(r.valid, false);
    assert.deepEqual(r.errors, [{ path: '.direction', message: 'Value must be one of: input, output, inout' }]);
});

test('integer fields reject fractions and values below minimum', () => {
    const v = validator();
    const frac = v.validate({ name: 'a', direction: 'input', width: 1.5 }, 'port_v1');
    assert.deepEqual(frac.errors, [{ path: '.width', message: 'Expected type integer, got number' }]);

    const zero = v.validate({ name: 'a', direction: 'input', width: 0 }, 'port_v1');
    assert.deepEqual(zero.errors, [{ path: '.width', message: 'Value 0 < minimum 1' }]);
});

test('identifier pattern is enforced', () => {
    const r = validator().validate({ name: '9lives', direction: 'input', width: 1 }, 'port_v1');
    assert.equal(r.valid, false);
    assert.equal(r.errors[0].path, '.name');
});

test('missing required field is reported with its path', () => {
    const r = validator().validate({ name: 'a', width: 4 }, 'port_v1');
    assert.deepEqual(r.errors, [{ path: '.direction', message: 'Required field missing' }]);
});

test('nested array items are validated with indexed paths', () => {
    const r = validator().validate(
        { modules: [{ name: 'half_adder', ports: [{ name: 'a', direction: 'input', width: 1 }, { name: 'b', direction: 'in', width: 1 }] }] },
        'modules_v1'
    );
    assert.equal(r.valid, false);
    assert.deepEqual(r.errors, [{ path: '.modules[0].ports[1].direction', message: 'Value must be one of: input, output, inout' }]);
});

test('empty module list fails minItems', () => {
    const r = validator().validate({ modules: [] }, 'modules_v1');
    assert.deepEqual(r.errors, [{ path: '.modules', message: 'Expected at least 1 items, got 0' }]);
});

test('non-object payloads fail at the root', () => {
    const r = validator().validate([1, 2], 'modules_v1');
    assert.deepEqual(r.errors, [{ path: '', message: 'Expected type object, got array' }]);
    assert.equal(formatValidationErrors(r.errors), '<root>: Expected type object, got array');
});

test('unknown schema id is an error, not a pass', () => {
    const r = validator().validate({}, 'nope');
    assert.equal(r.valid, false);
    assert.equal(r.errors[0].message, 'Schema not found: nope');
});

test('formatValidationErrors joins path and message', () => {
    assert.equal(
        formatValidationErrors([
            { path: '.a', message: 'x' },
            { path: '.b', message: 'y' },
        ]),
        '.a: x; .b: y'
    );
});
