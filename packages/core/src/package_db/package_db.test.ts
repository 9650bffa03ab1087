/**
 * PackageDB Tests
 *
 * Requests go to a scripted FakeServer; the assertions pin the path, verb
 * and form fields each method sends and how the answer is unwrapped.
 */

import { PackageDB, DEFAULT_PACKAGEDB_URL } from './package_db';
import { AppError, PackageDBError, ServerError } from '../errors';
import { MemorySessionStore } from '../session_store';
import { FakeServer } from '../testing/fake_fetch';
import type { FakeHandler, FakeReply } from '../testing/fake_fetch';
import type { JsonValue } from '../http';

const BASE_URL = 'https://pkgdb.example.test/pkgdb/';
const LOGIN_OK: FakeReply = { body: { user: { username: 'alice' } }, setCookie: ['tg-visit=fresh; Path=/'] };

const DEVEL = { id: 8, name: 'Fedora', version: 'devel', branchname: 'devel', statuscode: 1 };
const F13 = { id: 21, name: 'Fedora', version: '13', branchname: 'F-13', statuscode: 1 };
const FC6 = { id: 3, name: 'Fedora', version: '6', branchname: 'FC-6', statuscode: 9 };
const COLLECTIONS: JsonValue = { collections: [[DEVEL, 14000], [F13, 12000], [FC6, 6000]] };

function setup(handler: FakeHandler) {
  const server = new FakeServer(BASE_URL, handler);
  const pkgdb = new PackageDB(
    {
      baseUrl: BASE_URL,
      username: 'alice',
      password: 'test-secret',
      sessionStore: new MemorySessionStore(),
      logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
    },
    server.fetchFn
  );
  return { server, pkgdb };
}

/** Answers logins with LOGIN_OK and every other path from `replies`. */
function routes(replies: Record<string, FakeReply>): FakeHandler {
  return (request) => {
    if (request.path === 'login') return LOGIN_OK;
    return replies[request.path] ?? { status: 404 };
  };
}

describe('PackageDB', () => {
  describe('construction', () => {
    it('should default to the public package database', () => {
      const pkgdb = new PackageDB({ cacheSession: false });

      expect(pkgdb.baseUrl).toBe(DEFAULT_PACKAGEDB_URL);
      expect(pkgdb.userAgent).toMatch(/^pkgdb-client PackageDB\/\d+\.\d+\.\d+$/);
    });

    it('should request the tg_format=json representation', async () => {
      const { server, pkgdb } = setup(routes({ 'lists/vcs': { body: { packageAcls: {} } } }));

      await pkgdb.getVcsAcls();

      expect(server.requests[0]?.query).toEqual({ tg_format: 'json' });
    });
  });

  describe('canonicalBranchName', () => {
    const pkgdb = new PackageDB({ cacheSession: false });

    it('should expand known abbreviations', () => {
      expect(pkgdb.canonicalBranchName('FC-6')).toEqual(['Fedora', '6']);
      expect(pkgdb.canonicalBranchName('F-13')).toEqual(['Fedora', '13']);
      expect(pkgdb.canonicalBranchName('EL-5')).toEqual(['Fedora EPEL', '5']);
      expect(pkgdb.canonicalBranchName('OLPC-2')).toEqual(['Fedora OLPC', '2']);
    });

    it('should map devel to the Fedora development collection', () => {
      expect(pkgdb.canonicalBranchName('devel')).toEqual(['Fedora', 'devel']);
    });

    it('should reject unknown abbreviations', () => {
      expect(() => pkgdb.canonicalBranchName('XX-1')).toThrow(
        new PackageDBError('Collection abbreviation XX is unknown. Use F, FC, EL, or OLPC')
      );
    });

    it('should reject a branch without a version', () => {
      expect(() => pkgdb.canonicalBranchName('F')).toThrow(PackageDBError);
    });
  });

  describe('getBranches', () => {
    it('should key collections by branch name and cache them', async () => {
      const { server, pkgdb } = setup(routes({ 'collections/': { body: COLLECTIONS } }));

      const branches = await pkgdb.getBranches();
      await pkgdb.getBranches();

      expect(Object.keys(branches)).toEqual(['devel', 'F-13', 'FC-6']);
      expect(branches['F-13']?.version).toBe('13');
      expect(server.fetch).toHaveBeenCalledTimes(1);
    });

    it('should refetch when asked to refresh', async () => {
      const { server, pkgdb } = setup(routes({ 'collections/': { body: COLLECTIONS } }));

      await pkgdb.getBranches();
      await pkgdb.getBranches(true);

      expect(server.paths()).toEqual(['collections/', 'collections/']);
    });

    it('should skip entries that are not collections', async () => {
      const { pkgdb } = setup(
        routes({ 'collections/': { body: { collections: [[DEVEL, 1], 'junk', [{ id: 'x' }]] } } })
      );

      expect(Object.keys(await pkgdb.getBranches())).toEqual(['devel']);
    });

    it('should raise ServerError when the list is missing', async () => {
      const { pkgdb } = setup(routes({ 'collections/': { body: {} } }));

      await expect(pkgdb.getBranches()).rejects.toMatchObject({
        name: 'ServerError',
        code: 'INVALID_RESPONSE',
      });
    });
  });

  describe('getPackageInfo', () => {
    it('should GET the package without a branch', async () => {
      const { server, pkgdb } = setup(routes({ 'acls/name/bash': { body: { packageListings: [] } } }));

      const info = await pkgdb.getPackageInfo('bash');

      expect(info).toEqual({ packageListings: [] });
      expect(server.requests[0]?.method).toBe('GET');
    });

    it('should POST the canonical collection for a branch', async () => {
      const { server, pkgdb } = setup(routes({ 'acls/name/bash': { body: { packageListings: [] } } }));

      await pkgdb.getPackageInfo('bash', 'F-13');

      expect(server.requests[0]?.method).toBe('POST');
      expect(server.requests[0]?.form).toEqual({ collectionName: 'Fedora', collectionVersion: '13' });
    });

    it('should raise AppError for a failed status', async () => {
      const { pkgdb } = setup(
        routes({ 'acls/name/nosuch': { body: { status: false, message: 'No such package nosuch' } } })
      );

      const error = await pkgdb.getPackageInfo('nosuch').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ appName: 'PackageDBError', message: 'No such package nosuch' });
    });
  });

  describe('getOwners', () => {
    it('should append collection name and version to the path', async () => {
      const { server, pkgdb } = setup(routes({ 'acls/name/bash/Fedora/devel': { body: { packageListings: [] } } }));

      await pkgdb.getOwners('bash', 'Fedora', 'devel');

      expect(server.paths()).toEqual(['acls/name/bash/Fedora/devel']);
    });

    it('should ignore a version without a collection name', async () => {
      const { server, pkgdb } = setup(routes({ 'acls/name/bash': { body: { packageListings: [] } } }));

      await pkgdb.getOwners('bash', undefined, '13');

      expect(server.paths()).toEqual(['acls/name/bash']);
    });
  });

  describe('cloneBranch and massBranch', () => {
    it('should clone a branch with an authenticated POST', async () => {
      const { server, pkgdb } = setup(
        routes({ 'acls/dispatcher/clone_branch/bash/F-13/devel': { body: { status: true } } })
      );

      await pkgdb.cloneBranch('bash', 'F-13', 'devel');

      expect(server.paths()).toEqual(['login', 'acls/dispatcher/clone_branch/bash/F-13/devel']);
      expect(server.requests[1]?.headers['cookie']).toBe('tg-visit=fresh');
      expect(server.requests[1]?.form).toEqual({ email_log: 'true' });
    });

    it('should mass branch with an authenticated GET', async () => {
      const { server, pkgdb } = setup(routes({ 'collections/mass_branch/F-14': { body: { status: true } } }));

      await pkgdb.massBranch('F-14');

      expect(server.requests[1]?.method).toBe('GET');
      expect(server.requests[1]?.headers['cookie']).toBe('tg-visit=fresh');
    });
  });

  describe('addPackage', () => {
    it('should refuse to add a package without an owner', async () => {
      const { server, pkgdb } = setup(routes({}));

      await expect(pkgdb.addPackage('bash')).rejects.toMatchObject({ appName: 'AppError' });
      expect(server.fetch).not.toHaveBeenCalled();
    });

    it('should only add when no extra fields are given', async () => {
      const { server, pkgdb } = setup(routes({ 'acls/dispatcher/add_package/bash': { body: { status: true } } }));

      await pkgdb.addPackage('bash', { owner: 'alice', description: 'A shell' });

      expect(server.paths()).toEqual(['login', 'acls/dispatcher/add_package/bash']);
      expect(server.requests[1]?.form).toEqual({ owner: 'alice', summary: 'A shell' });
    });

    it('should follow up with an edit for watchers and branches', async () => {
      const { server, pkgdb } = setup(
        routes({
          'acls/dispatcher/add_package/bash': { body: { status: true } },
          'acls/dispatcher/edit_package/bash': { body: { status: true } },
        })
      );

      await pkgdb.addPackage('bash', { owner: 'alice', ccList: ['bob'], branches: ['devel', 'F-13'] });

      expect(server.paths()).toEqual([
        'login',
        'acls/dispatcher/add_package/bash',
        'acls/dispatcher/edit_package/bash',
      ]);
      expect(server.requests[2]?.form).toEqual({ ccList: '["bob"]', collections: ['devel', 'F-13'] });
    });

    it('should describe a failed add', async () => {
      const { pkgdb } = setup(
        routes({ 'acls/dispatcher/add_package/bash': { body: { status: false, message: 'duplicate' } } })
      );

      await expect(pkgdb.addPackage('bash', { owner: 'alice' })).rejects.toMatchObject({
        appName: 'PackageDBError',
        message: 'PackageDB returned an error creating bash: duplicate',
      });
    });
  });

  describe('editPackage', () => {
    it('should encode list fields as JSON', async () => {
      const { server, pkgdb } = setup(routes({ 'acls/dispatcher/edit_package/bash': { body: { status: true } } }));

      await pkgdb.editPackage('bash', { owner: 'carol', comaintainers: ['dave', 'erin'], groups: ['provenpackager'] });

      expect(server.requests[1]?.form).toEqual({
        owner: 'carol',
        comaintList: '["dave","erin"]',
        groups: '["provenpackager"]',
      });
    });

    it('should describe a failed edit', async () => {
      const { pkgdb } = setup(
        routes({ 'acls/dispatcher/edit_package/bash': { body: { status: false, message: 'not allowed' } } })
      );

      await expect(pkgdb.editPackage('bash', { owner: 'carol' })).rejects.toMatchObject({
        message: 'Unable to save all information for bash: not allowed',
      });
    });
  });

  describe('removeUser', () => {
    it('should send the user, package and collections', async () => {
      const { server, pkgdb } = setup(routes({ 'acls/dispatcher/remove_user': { body: { status: true } } }));

      const result = await pkgdb.removeUser('bob', 'bash', ['F-13', 'devel']);

      expect(result).toEqual({ status: true });
      expect(server.requests[1]?.form).toEqual({
        username: 'bob',
        pkg_name: 'bash',
        collectn_list: ['F-13', 'devel'],
      });
    });
  });

  describe('userPackages', () => {
    it('should send ACL filters and the eol flag', async () => {
      const { server, pkgdb } = setup(routes({ 'users/packages/bob': { body: { pkgs: [] } } }));

      await pkgdb.userPackages('bob', ['owner', 'commit']);

      expect(server.requests[0]?.form).toEqual({
        eol: 'false',
        tg_paginate_limit: '0',
        acls: ['owner', 'commit'],
      });
    });
  });

  describe('orphanPackages', () => {
    it('should return the orphaned packages', async () => {
      const { server, pkgdb } = setup(routes({ 'acls/orphans': { body: { pkgs: [{ name: 'zsh' }] } } }));

      expect(await pkgdb.orphanPackages()).toEqual([{ name: 'zsh' }]);
      expect(server.requests[0]?.form).toEqual({ tg_paginate_limit: '0' });
    });
  });

  describe('getCollectionList', () => {
    it('should include end-of-life collections by default', async () => {
      const { pkgdb } = setup(routes({ 'collections/': { body: COLLECTIONS } }));

      const collections = await pkgdb.getCollectionList();

      expect(collections.map(([collection]) => collection.branchname)).toEqual(['devel', 'F-13', 'FC-6']);
    });

    it('should drop end-of-life collections when eol is false', async () => {
      const { pkgdb } = setup(routes({ 'collections/': { body: COLLECTIONS } }));

      const collections = await pkgdb.getCollectionList(false);

      expect(collections.map(([collection]) => collection.branchname)).toEqual(['devel', 'F-13']);
    });
  });

  describe('getPackageList', () => {
    const packages: JsonValue = { packages: [{ name: 'bash' }, { name: 'zsh' }, { id: 3 }] };

    it('should list every package without a collection', async () => {
      const { server, pkgdb } = setup(routes({ 'acls/list/*': { body: packages } }));

      expect(await pkgdb.getPackageList()).toEqual(['bash', 'zsh']);
      expect(server.paths()).toEqual(['acls/list/*']);
    });

    it('should check the collection before listing it', async () => {
      const { server, pkgdb } = setup(
        routes({ 'collections/': { body: COLLECTIONS }, 'collections/name/F-13/': { body: packages } })
      );

      expect(await pkgdb.getPackageList('F-13')).toEqual(['bash', 'zsh']);
      expect(server.paths()).toEqual(['collections/', 'collections/name/F-13/']);
    });

    it('should reject an unknown collection', async () => {
      const { server, pkgdb } = setup(routes({ 'collections/': { body: COLLECTIONS } }));

      await expect(pkgdb.getPackageList('F-99')).rejects.toThrow(
        new PackageDBError('Collection shortname F-99 is unknown.')
      );
      expect(server.paths()).toEqual(['collections/']);
    });
  });

  describe('ACL lists', () => {
    it('should unwrap the version control ACLs', async () => {
      const { pkgdb } = setup(routes({ 'lists/vcs': { body: { packageAcls: { bash: {} } } } }));

      expect(await pkgdb.getVcsAcls()).toEqual({ bash: {} });
    });

    it('should unwrap the bug tracker ACLs', async () => {
      const { pkgdb } = setup(routes({ 'lists/bugzilla': { body: { bugzillaAcls: { Fedora: {} } } } }));

      expect(await pkgdb.getBugzillaAcls()).toEqual({ Fedora: {} });
    });

    it('should raise ServerError when the payload field is missing', async () => {
      const { pkgdb } = setup(routes({ 'lists/vcs': { body: {} } }));

      const error = await pkgdb.getVcsAcls().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({ message: 'Expected "packageAcls" in server response' });
    });

    it('should scope notify lists to a collection', async () => {
      const { server, pkgdb } = setup(routes({ 'lists/notify/Fedora/13': { body: { packages: { bash: ['bob'] } } } }));

      expect(await pkgdb.getNotifyAcls('Fedora', '13')).toEqual({ bash: ['bob'] });
      expect(server.requests[0]?.form).toEqual({ eol: 'false' });
    });
  });

  describe('critical path', () => {
    it('should fetch critical path packages for collections', async () => {
      const { server, pkgdb } = setup(routes({ 'lists/critpath': { body: { pkgs: { 'F-13': ['bash'] } } } }));

      expect(await pkgdb.getCritpathPkgs(['F-13'])).toEqual({ 'F-13': ['bash'] });
      expect(server.requests[0]?.form).toEqual({ collctn_list: 'F-13' });
    });

    it('should GET all critical path packages without collections', async () => {
      const { server, pkgdb } = setup(routes({ 'lists/critpath': { body: { pkgs: {} } } }));

      await pkgdb.getCritpathPkgs();

      expect(server.requests[0]?.method).toBe('GET');
    });

    it('should set the critical path flag with authentication', async () => {
      const { server, pkgdb } = setup(routes({ 'acls/dispatcher/set_critpath': { body: {} } }));

      await pkgdb.setCritpath({ pkgList: ['bash', 'glibc'], collctnList: ['devel'] });

      expect(server.paths()).toEqual(['login', 'acls/dispatcher/set_critpath']);
      expect(server.requests[1]?.form).toEqual({
        critpath: 'true',
        reset: 'false',
        pkg_list: ['bash', 'glibc'],
        collctn_list: 'devel',
      });
    });
  });
});
