import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the query and entry classes', async () => {
    const { Entry, QueryDescriptor, QueryUnion, LdapDirectory } = await import('../../src/index.js');
    expect(typeof Entry).toBe('function');
    expect(typeof QueryDescriptor).toBe('function');
    expect(typeof QueryUnion).toBe('function');
    expect(typeof LdapDirectory).toBe('function');
  });

  it('exports the filter builders', async () => {
    const { and, equality, presence, serializeFilter } = await import('../../src/index.js');
    expect(serializeFilter(and(equality('uid', 'alice'), presence('mail')))).toBe('(&(uid=alice)(mail=*))');
  });

  it('exports NotFoundError as a class usable with instanceof', async () => {
    const { NotFoundError } = await import('../../src/index.js');
    const err = new NotFoundError('dc=acme');
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('NotFoundError');
  });

  it('does NOT export the model layer from the root entry point', async () => {
    const api = await import('../../src/index.js');
    expect('Model' in api).toBe(false);
    expect('CapabilityRegistry' in api).toBe(false);
  });

  it('exports the model layer from its own entry point', async () => {
    const { Model, ModelEntry, ModelCatalog, CapabilityRegistry, defineCapability } = await import(
      '../../src/model/index.js'
    );
    expect(typeof Model).toBe('function');
    expect(typeof ModelEntry).toBe('function');
    expect(typeof ModelCatalog).toBe('function');
    expect(typeof CapabilityRegistry).toBe('function');
    expect(defineCapability({ name: 'x', objectClasses: ['device'] }).objectClasses).toEqual(['device']);
  });

  it('does NOT export internal helpers', async () => {
    const api = await import('../../src/index.js');
    expect('tokenize' in api).toBe(false);
    expect('toRawEntry' in api).toBe(false);
  });
});
