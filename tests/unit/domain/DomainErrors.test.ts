import { describe, it, expect } from 'vitest';
import {
  PathbookError,
  UnknownAliasError,
  InvalidAliasError,
  UndefinedPlaceholderError,
  MissingArgumentsError,
  CyclicReferenceError,
  TemplateFormatError,
  CallableInvocationError,
} from '../../../src/domain/errors/DomainErrors.js';

describe('DomainErrors', () => {
  it('UnknownAliasError is a lookup error listing known aliases', () => {
    const err = new UnknownAliasError('epochs', ['subjects', 'fsaverage']);
    expect(err.classification).toBe('lookup');
    expect(err.code).toBe('UNKNOWN_ALIAS');
    expect(err.alias).toBe('epochs');
    expect(err.message).toBe('Unknown alias "epochs". Registered aliases: subjects, fsaverage');
    expect(err).toBeInstanceOf(PathbookError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('UnknownAliasError');
  });

  it('UnknownAliasError mentions an empty registry', () => {
    const err = new UnknownAliasError('x', []);
    expect(err.message).toBe('Unknown alias "x". Registered aliases: (none)');
  });

  it('InvalidAliasError is a lookup error', () => {
    const err = new InvalidAliasError('_hidden');
    expect(err.classification).toBe('lookup');
    expect(err.code).toBe('INVALID_ALIAS');
    expect(err.message).toContain('"_hidden"');
  });

  it('UndefinedPlaceholderError is a template error', () => {
    const err = new UndefinedPlaceholderError('epochs', ['subject', 'cond']);
    expect(err.classification).toBe('template');
    expect(err.code).toBe('UNDEFINED_PLACEHOLDER');
    expect(err.placeholders).toEqual(['subject', 'cond']);
    expect(err.message).toBe(
      'Cannot construct path for "epochs", because the following placeholders are missing: subject, cond',
    );
  });

  it('MissingArgumentsError points the caller at resolve()', () => {
    const err = new MissingArgumentsError('epochs', ['subject', 'cond']);
    expect(err.classification).toBe('template');
    expect(err.code).toBe('MISSING_ARGUMENTS');
    expect(err.message).toBe(
      "Alias \"epochs\" needs values for subject, cond. Use resolve('epochs', { subject: ..., cond: ... }) instead of get().",
    );
  });

  it('CyclicReferenceError shows the whole chain', () => {
    const err = new CyclicReferenceError(['a', 'b', 'a']);
    expect(err.classification).toBe('template');
    expect(err.code).toBe('CYCLIC_REFERENCE');
    expect(err.chain).toEqual(['a', 'b', 'a']);
    expect(err.message).toBe('Cyclic alias reference: a -> b -> a');
  });

  it('TemplateFormatError names the template', () => {
    const cause = new Error('bad spec');
    const err = new TemplateFormatError('bad spec', '/data/{x:q}', { cause });
    expect(err.code).toBe('FORMAT_ERROR');
    expect(err.template).toBe('/data/{x:q}');
    expect(err.message).toBe('bad spec (in template "/data/{x:q}")');
    expect(err.cause).toBe(cause);
  });

  it('CallableInvocationError wraps the original error', () => {
    const cause = new TypeError('subject is required');
    const err = new CallableInvocationError('complicated', cause);
    expect(err.classification).toBe('invocation');
    expect(err.code).toBe('CALLABLE_INVOCATION');
    expect(err.alias).toBe('complicated');
    expect(err.cause).toBe(cause);
    expect(err.message).toBe('Path function for "complicated" failed: subject is required');
  });

  it('CallableInvocationError accepts non-Error throwables', () => {
    const err = new CallableInvocationError('f', 'plain string');
    expect(err.message).toBe('Path function for "f" failed: plain string');
    expect(err.cause).toBe('plain string');
  });
});
