import { describe, it, expect, vi, beforeEach } from 'vitest';
import { dnKey } from '../../src/dn.js';
import { Entry, compareEntries } from '../../src/entry/entry.js';
import { InvalidDnError, NotFoundError, UnknownAttributeError } from '../../src/errors.js';
import { makeDirectory, type FakeDirectory } from './helpers.js';

const BASE = 'dc=acme,dc=com';
const PEOPLE = 'ou=people,dc=acme,dc=com';
const HOSTS = 'ou=hosts,dc=acme,dc=com';
const ALICE = 'uid=alice,ou=people,dc=acme,dc=com';
const BOB = 'uid=bob,ou=people,dc=acme,dc=com';
const DAVE = 'uid=dave,ou=people,dc=acme,dc=com';
const GATEWAY = 'cn=gateway,ou=hosts,dc=acme,dc=com';

class Person extends Entry {}

describe('Entry', () => {
  let directory: FakeDirectory;

  beforeEach(() => {
    directory = makeDirectory();
  });

  // ---------------------------------------------------------------------------
  // DN and navigation
  // ---------------------------------------------------------------------------
  describe('DN', () => {
    it('exposes the RDN, parent DN and split forms', () => {
      const alice = new Entry(directory, ALICE);
      expect(alice.rdn).toBe('uid=alice');
      expect(alice.rdnPairs).toEqual([{ attribute: 'uid', value: 'alice' }]);
      expect(alice.parentDn).toBe(PEOPLE);
      expect(alice.splitDn(2)).toEqual(['uid=alice', PEOPLE]);
      expect(alice.toUfn()).toBe('alice, people, acme, com');
      expect(String(alice)).toBe(ALICE);
    });

    it('rejects an invalid DN', () => {
      expect(() => new Entry(directory, 'nonsense')).toThrow(InvalidDnError);
    });

    it('navigates to the parent, which is null at the top', () => {
      expect(new Entry(directory, ALICE).parent()?.dn).toBe(PEOPLE);
      expect(new Entry(directory, 'dc=com').parent()).toBeNull();
    });

    it('builds children without touching the directory', async () => {
      const getEntry = vi.spyOn(directory, 'getEntry');
      const people = new Entry(directory, PEOPLE);
      const hosts = new Entry(directory, HOSTS);

      expect((await people.child('uid', 'dave')).dn).toBe(DAVE);
      expect((await hosts.child('cn', 'printer', { ipHostNumber: '192.0.2.9' })).dn).toBe(
        'cn=printer+ipHostNumber=192.0.2.9,ou=hosts,dc=acme,dc=com',
      );
      expect((await people.child('cn', 'Smith, John')).rdn).toBe('cn=Smith\\, John');
      expect(getEntry).not.toHaveBeenCalled();
    });

    it('rejects children named by an unknown attribute', async () => {
      const people = new Entry(directory, PEOPLE);
      await expect(people.child('favouriteColour', 'blue')).rejects.toThrow(UnknownAttributeError);
      await expect(people.child('uid', 'dave', { shoeSize: '9' })).rejects.toThrow(
        'No attributeType named "shoeSize" in the directory schema',
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Reading
  // ---------------------------------------------------------------------------
  describe('reading', () => {
    it('fails to fetch a missing entry', async () => {
      await expect(new Entry(directory, DAVE).fetch()).rejects.toThrow(NotFoundError);
      await expect(new Entry(directory, DAVE).fetch()).rejects.toThrow(`No entry found for ${DAVE}`);
    });

    it('reports existence', async () => {
      directory.add('cn=empty,dc=acme,dc=com', {});
      expect(await new Entry(directory, ALICE).exists()).toBe(true);
      expect(await new Entry(directory, DAVE).exists()).toBe(false);
      expect(await new Entry(directory, 'cn=empty,dc=acme,dc=com').exists()).toBe(false);
    });

    it('returns raw values by case-insensitive name', async () => {
      const bob = new Entry(directory, BOB);
      expect(await bob.raw('CN')).toEqual(['Bob Jones', 'Robert Jones']);
      expect(await bob.raw('mail')).toBeNull();
    });

    it('decodes values by syntax and returns scalars for single-valued types', async () => {
      const bob = new Entry(directory, BOB);
      expect(await bob.get('cn')).toEqual(['Bob Jones', 'Robert Jones']);
      expect(await bob.get('uidNumber')).toBe(1001);
      expect(await bob.get('accountLocked')).toBe(false);
      expect(await bob.get('homeDirectory')).toBe('/home/bob');
      expect(await bob.get('mail')).toBeNull();
    });

    it('fetches once and caches decoded values', async () => {
      const getEntry = vi.spyOn(directory, 'getEntry');
      const bob = new Entry(directory, BOB);
      const first = await bob.get('cn');
      const second = await bob.get('CN');
      await bob.get('sn');
      expect(second).toBe(first);
      expect(getEntry).toHaveBeenCalledTimes(1);
    });

    it('returns null and logs for an attribute the schema does not know', async () => {
      directory.add(DAVE, { objectClass: ['top'], uid: ['dave'], favouriteColour: ['blue'] });
      const dave = new Entry(directory, DAVE);
      expect(await dave.get('favouriteColour')).toBeNull();
      expect(directory.logger.info).toHaveBeenCalledWith(`No attributeType for "favouriteColour" on ${DAVE}`);
      expect(await dave.raw('favouriteColour')).toEqual(['blue']);
    });

    it('reads operational attributes only when asked to', async () => {
      directory.operational.set(dnKey(ALICE), { createTimestamp: ['20240131235959Z'] });
      const extended = new Entry(directory, ALICE, null, { includeOperationalAttrs: true });

      expect(await extended.get('createTimestamp')).toEqual(new Date('2024-01-31T23:59:59.000Z'));
      expect(await new Entry(directory, ALICE).get('createTimestamp')).toBeNull();
    });
  });

  // ---------------------------------------------------------------------------
  // Writing
  // ---------------------------------------------------------------------------
  describe('writing', () => {
    it('replaces one attribute and keeps the other cached values', async () => {
      const getEntry = vi.spyOn(directory, 'getEntry');
      const alice = new Entry(directory, ALICE);
      expect(await alice.get('l')).toEqual(['Portland']);
      await alice.get('sn');

      await alice.set('l', 'Eugene');

      expect(await alice.get('l')).toEqual(['Eugene']);
      expect(await alice.get('sn')).toEqual(['Smith']);
      expect(getEntry).toHaveBeenCalledTimes(1);
      expect(directory.entries.get(dnKey(ALICE))?.attributes.l).toEqual(['Eugene']);
    });

    it('refetches after a merge', async () => {
      const getEntry = vi.spyOn(directory, 'getEntry');
      const alice = new Entry(directory, ALICE);
      await alice.get('sn');

      await alice.merge({ sn: 'Smythe', title: ['Engineer', 'Lead'] });

      expect(await alice.get('sn')).toEqual(['Smythe']);
      expect(await alice.get('title')).toEqual(['Engineer', 'Lead']);
      expect(getEntry).toHaveBeenCalledTimes(2);
    });

    it('removes whole attributes or single values', async () => {
      const bob = new Entry(directory, BOB);
      await bob.get('l');

      await bob.delete(['l']);
      expect(await bob.get('l')).toBeNull();

      await bob.delete({ cn: 'Robert Jones' });
      expect(await bob.get('cn')).toEqual(['Bob Jones']);
    });

    it('deletes the entry without arguments', async () => {
      const bob = new Entry(directory, BOB);
      await bob.fetch();
      await bob.delete();
      expect(await bob.exists()).toBe(false);
    });

    it('keeps its cached state when the directory rejects a write', async () => {
      const alice = new Entry(directory, ALICE);
      expect(await alice.get('l')).toEqual(['Portland']);
      const getEntry = vi.spyOn(directory, 'getEntry');
      const failure = new Error('directory unavailable');
      vi.spyOn(directory, 'modify').mockRejectedValue(failure);
      vi.spyOn(directory, 'deleteAttributes').mockRejectedValue(failure);
      vi.spyOn(directory, 'delete').mockRejectedValue(failure);

      await expect(alice.set('l', 'Eugene')).rejects.toBe(failure);
      await expect(alice.merge({ l: 'Eugene', sn: 'Smythe' })).rejects.toBe(failure);
      await expect(alice.delete(['l'])).rejects.toBe(failure);
      await expect(alice.delete()).rejects.toBe(failure);

      expect(await alice.get('l')).toEqual(['Portland']);
      expect(await alice.raw('l')).toEqual(['Portland']);
      expect(await alice.exists()).toBe(true);
      expect(getEntry).not.toHaveBeenCalled();
      expect(directory.entries.get(dnKey(ALICE))?.attributes.l).toEqual(['Portland']);
    });

    it('creates the entry from the attributes it was built with', async () => {
      const dave = new Entry(directory, DAVE, {
        dn: DAVE,
        attributes: { objectClass: ['top', 'person'], uid: ['dave'], cn: ['Dave Brown'], sn: ['Brown'] },
      });
      await dave.create();
      expect(directory.entries.get(dnKey(DAVE))?.attributes.cn).toEqual(['Dave Brown']);
      expect(await dave.exists()).toBe(true);
    });

    it('creates the entry from explicit attributes', async () => {
      const printer = new Entry(directory, 'cn=printer,ou=hosts,dc=acme,dc=com');
      await printer.create({ objectClass: ['top', 'device'], cn: 'printer' });
      expect(await printer.raw('cn')).toEqual(['printer']);
      expect(await printer.raw('objectClass')).toEqual(['top', 'device']);
    });

    it('copies to a new DN with the RDN and overrides applied', async () => {
      const copy = await new Entry(directory, ALICE).copy('uid=alice2,ou=people,dc=acme,dc=com', {
        displayName: 'Alice Two',
      });
      expect(copy.dn).toBe('uid=alice2,ou=people,dc=acme,dc=com');
      expect(await copy.raw('uid')).toEqual(['alice2']);
      expect(await copy.raw('displayName')).toEqual(['Alice Two']);
      expect(await copy.raw('sn')).toEqual(['Smith']);
      expect(await new Entry(directory, ALICE).exists()).toBe(true);
    });

    it('rejects a copy to an invalid DN', async () => {
      await expect(new Entry(directory, ALICE).copy('not a dn')).rejects.toThrow(InvalidDnError);
    });

    it('moves within its parent and follows the new DN', async () => {
      const alice = new Entry(directory, ALICE);
      await alice.get('uid');

      const moved = await alice.move('uid=alicia', { uid: 'alicia' });

      expect(moved).toBe(alice);
      expect(alice.dn).toBe('uid=alicia,ou=people,dc=acme,dc=com');
      expect(await alice.get('uid')).toEqual(['alicia']);
      expect(directory.entries.has(dnKey(ALICE))).toBe(false);
    });

    it('rejects a move to more than one RDN component', async () => {
      await expect(new Entry(directory, ALICE).move('uid=alicia,ou=staff')).rejects.toThrow(
        'Invalid RDN "uid=alicia,ou=staff": expected a single component',
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Ordering
  // ---------------------------------------------------------------------------
  describe('compare', () => {
    it('orders ancestors first and siblings by RDN', () => {
      const base = new Entry(directory, BASE);
      const people = new Entry(directory, PEOPLE);
      const hosts = new Entry(directory, HOSTS);
      const alice = new Entry(directory, ALICE);
      const bob = new Entry(directory, BOB);

      expect(base.compare(people)).toBe(-1);
      expect(people.compare(base)).toBe(1);
      expect(alice.compare(bob)).toBe(-1);
      expect(alice.compare(hosts)).toBe(1);
      expect(alice.compare(new Entry(directory, 'UID=Alice, ou=people,dc=acme,dc=com'))).toBe(0);

      const sorted = [alice, base, bob, people, hosts].sort((a, b) => a.compare(b) ?? 0);
      expect(sorted.map((e) => e.dn)).toEqual([BASE, HOSTS, PEOPLE, ALICE, BOB]);
    });

    it('treats multi-valued RDNs with reordered pairs as the same entry', () => {
      const first = new Entry(directory, 'cn=lab+l=Portland,ou=hosts,dc=acme,dc=com');
      const second = new Entry(directory, 'L=portland + cn=Lab,ou=hosts,dc=acme,dc=com');
      expect(first.compare(second)).toBe(0);
    });

    it('does not compare entries of different types', () => {
      expect(compareEntries(new Entry(directory, ALICE), new Person(directory, BOB))).toBeNull();
    });
  });

  // ---------------------------------------------------------------------------
  // Schema helpers
  // ---------------------------------------------------------------------------
  describe('schema helpers', () => {
    it('lists the schema objectClasses of the entry', async () => {
      const classes = await new Entry(directory, ALICE).objectClasses();
      expect(classes.map((oc) => oc.names[0])).toEqual(['top', 'person', 'organizationalPerson', 'inetOrgPerson']);
    });

    it('skips and logs objectClasses the schema does not know', async () => {
      const classes = await new Entry(directory, BASE).objectClasses();
      expect(classes.map((oc) => oc.names[0])).toEqual(['top']);
      expect(directory.logger.debug).toHaveBeenCalledWith('No objectClass "dcObject" in the schema');
    });

    it('resolves MUST and MAY attributes through the class hierarchy', async () => {
      const alice = new Entry(directory, ALICE);
      expect(await alice.mustOids()).toEqual(['objectClass', 'sn', 'cn']);
      expect(await alice.mayOids()).toEqual([
        'userPassword',
        'telephoneNumber',
        'description',
        'title',
        'l',
        'ou',
        'mail',
        'uid',
        'givenName',
        'displayName',
      ]);
    });

    it('adds extra objectClasses', async () => {
      expect(await new Entry(directory, ALICE).mustOids('posixAccount')).toEqual([
        'objectClass',
        'sn',
        'cn',
        'uid',
        'uidNumber',
        'gidNumber',
        'homeDirectory',
      ]);
    });

    it('uses only the extra objectClasses for an entry that does not exist', async () => {
      const dave = new Entry(directory, DAVE);
      expect(await dave.mustOids('device')).toEqual(['objectClass', 'cn']);
      expect(await dave.mustOids()).toEqual([]);
    });

    it('checks attributes against every objectClass', async () => {
      const alice = new Entry(directory, ALICE);
      expect(await alice.isValidAttribute('mail')).toBe(true);
      expect(await alice.isValidAttribute('RFC822MAILBOX')).toBe(true);
      expect(await alice.isValidAttribute('uidNumber')).toBe(false);
    });

    it('builds skeleton hashes, empty strings for single-valued types', async () => {
      const gateway = new Entry(directory, GATEWAY);
      expect(await gateway.mustAttributesHash()).toEqual({ objectClass: [], cn: [], ipHostNumber: [] });
      expect(await gateway.validAttributesHash()).toEqual({
        objectClass: [],
        cn: [],
        ipHostNumber: [],
        description: [],
        l: [],
        ou: [],
      });
      expect(await new Entry(directory, DAVE).mayAttributesHash('posixAccount')).toEqual({
        loginShell: '',
        accountLocked: '',
      });
    });

    it('resolves attribute types', async () => {
      const types = await new Entry(directory, GATEWAY).mustAttributeTypes();
      expect(types.map((t) => t.oid)).toEqual(['2.5.4.0', '2.5.4.3', '1.3.6.1.1.1.1.19']);
    });
  });

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------
  describe('queries', () => {
    it('starts descriptors rooted at the entry', () => {
      const people = new Entry(directory, PEOPLE);
      expect(people.filter({ uid: 'bob' }).filterString).toBe('(uid=bob)');
      expect(people.scope('base').scopeValue).toBe('base');
      expect(people.select('cn').selectedAttributes).toEqual(['cn']);
      expect(people.children().scopeValue).toBe('onelevel');
      expect(people.query().baseDn).toBe(PEOPLE);
      expect(people.combine(new Entry(directory, HOSTS)).baseDns).toEqual([PEOPLE, HOSTS]);
    });

    it('searches directly with the given scope and parameters', async () => {
      const search = vi.spyOn(directory, 'search');
      const found = await new Entry(directory, PEOPLE).search('one', { l: 'Portland' }, { limit: 2 });

      expect(search).toHaveBeenCalledWith(PEOPLE, 'onelevel', '(l=Portland)', {
        limit: 2,
        selectAttrs: [],
        timeout: 0,
        clientControls: [],
        serverControls: [],
      });
      expect(found.map((e) => e.rdn)).toEqual(['uid=alice', 'uid=bob']);
    });

    it('passes its options on to query results', async () => {
      const people = new Entry(directory, PEOPLE, null, { includeOperationalAttrs: true });
      const first = await people.children().first();
      expect(first?.includeOperationalAttrs).toBe(true);
      expect(people.parent()?.includeOperationalAttrs).toBe(true);
    });
  });
});
