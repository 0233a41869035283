import { describe, it, expect } from 'vitest';
import { ApiResponse } from '../apiResponse.js';
import { statusCodeOf, statusNameOf } from '../httpStatus.js';

describe('ApiResponse builder', () => {
  it('builds an envelope from message, status and data', () => {
    const user = { id: '1234', username: 'testUser', password: 'testPass' };

    const envelope = ApiResponse.builder()
      .message('User created successfully')
      .status('CREATED')
      .data({ user })
      .build();

    expect(envelope).toEqual({
      message: 'User created successfully',
      status: 'CREATED',
      data: { user },
    });
  });

  it('defaults to an empty OK envelope', () => {
    expect(ApiResponse.builder().build()).toEqual({
      message: '',
      status: 'OK',
      data: {},
    });
  });

  it('keeps message and status when data is set first', () => {
    const envelope = ApiResponse.builder()
      .data({ count: 1 })
      .message('Counted')
      .status('OK')
      .build();

    expect(envelope).toEqual({ message: 'Counted', status: 'OK', data: { count: 1 } });
  });

  it('freezes the envelope and its data map', () => {
    const source = { user: 'testUser' };
    const envelope = ApiResponse.builder().data(source).build();

    expect(Object.isFrozen(envelope)).toBe(true);
    expect(Object.isFrozen(envelope.data)).toBe(true);
    expect(Object.isFrozen(source)).toBe(false);
  });

  it('is not affected by later builder calls', () => {
    const builder = ApiResponse.builder().message('first');
    const first = builder.build();
    builder.message('second');

    expect(first.message).toBe('first');
    expect(builder.build().message).toBe('second');
  });
});

describe('statusCodeOf', () => {
  it.each([
    ['OK', 200],
    ['CREATED', 201],
    ['BAD_REQUEST', 400],
    ['UNAUTHORIZED', 401],
    ['NOT_FOUND', 404],
    ['CONFLICT', 409],
    ['PAYLOAD_TOO_LARGE', 413],
    ['UNSUPPORTED_MEDIA_TYPE', 415],
    ['TOO_MANY_REQUESTS', 429],
    ['INTERNAL_SERVER_ERROR', 500],
  ] as const)('maps %s to %i', (name, code) => {
    expect(statusCodeOf(name)).toBe(code);
  });
});

describe('statusNameOf', () => {
  it('finds the name for a known code', () => {
    expect(statusNameOf(413)).toBe('PAYLOAD_TOO_LARGE');
    expect(statusNameOf(404)).toBe('NOT_FOUND');
  });

  it('returns undefined for a code without a name', () => {
    expect(statusNameOf(418)).toBeUndefined();
  });
});
