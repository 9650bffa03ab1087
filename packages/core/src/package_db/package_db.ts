/**
 * PackageDB - library interface to the package database.
 *
 * Thin marshalling layer over BaseClient.sendRequest: each method maps to
 * one server path and unwraps the interesting part of the answer.
 *
 * @module package_db/package_db
 */

import { BaseClient } from '../base_client';
import { AppError, PackageDBError, ServerError } from '../errors';
import { isJsonObject } from '../http';
import type { FetchFn, JsonObject, JsonValue, RequestParams } from '../http';
import { VERSION } from '../version';
import { COLLECTION_MAP, EOL_STATUS_CODE } from './collection_map';
import type {
  Collection,
  CollectionEntry,
  PackageAcl,
  PackageDBOptions,
  PackageEditOptions,
  SetCritpathOptions,
} from './package_db.types';

export const DEFAULT_PACKAGEDB_URL = 'https://admin.fedoraproject.org/pkgdb/';

function isCollection(value: JsonValue | undefined): value is Collection {
  return (
    value !== undefined &&
    isJsonObject(value) &&
    typeof value['id'] === 'number' &&
    typeof value['name'] === 'string' &&
    typeof value['version'] === 'string' &&
    typeof value['branchname'] === 'string'
  );
}

function isCollectionEntry(value: JsonValue): value is CollectionEntry {
  return Array.isArray(value) && isCollection(value[0]);
}

/**
 * Returns `data[key]` as an array.
 * @throws ServerError when the server left it out
 */
function requireArray(data: JsonObject, key: string): JsonValue[] {
  const value = data[key];
  if (!Array.isArray(value)) {
    throw new ServerError(`Expected "${key}" list in server response`, 'INVALID_RESPONSE');
  }
  return value;
}

function requireField(data: JsonObject, key: string): JsonValue {
  const value = data[key];
  if (value === undefined) {
    throw new ServerError(`Expected "${key}" in server response`, 'INVALID_RESPONSE');
  }
  return value;
}

function requireCollections(data: JsonObject): CollectionEntry[] {
  return requireArray(data, 'collections').filter(isCollectionEntry);
}

/**
 * The package database answers failures as `{ status: false, message }`.
 */
function checkStatus(response: JsonObject, describe?: (message: string) => string): JsonObject {
  if ('status' in response && !response['status']) {
    const message = String(response['message'] ?? 'unknown error');
    throw new AppError('PackageDBError', describe ? describe(message) : message, response);
  }
  return response;
}

function appendCollectionPath(method: string, collctnName?: string, collctnVer?: string): string {
  if (!collctnName) {
    return method;
  }
  return collctnVer ? `${method}/${collctnName}/${collctnVer}` : `${method}/${collctnName}`;
}

/**
 * @example
 * ```typescript
 * const pkgdb = await new PackageDB({ username: 'alice', password }).initialize();
 * const owners = await pkgdb.getOwners('bash', 'Fedora', 'devel');
 * const orphans = await pkgdb.orphanPackages();
 * ```
 */
export class PackageDB extends BaseClient {
  private branchCache: Record<string, Collection> | null = null;

  constructor(options: PackageDBOptions = {}, fetchFn?: FetchFn) {
    super(
      {
        ...options,
        baseUrl: options.baseUrl ?? DEFAULT_PACKAGEDB_URL,
        userAgent: options.userAgent ?? `pkgdb-client PackageDB/${VERSION}`,
        formatParam: options.formatParam ?? 'tg_format',
      },
      fetchFn
    );
  }

  /**
   * Collection branch information, keyed by branch short name.
   * Cached after the first call unless `refresh` is set.
   */
  async getBranches(refresh = false): Promise<Record<string, Collection>> {
    if (this.branchCache && !refresh) {
      return this.branchCache;
    }
    const data = await this.sendRequest('/collections/');
    const branches: Record<string, Collection> = {};
    for (const [collection] of requireCollections(data)) {
      branches[collection.branchname] = collection;
    }
    this.branchCache = branches;
    return branches;
  }

  /**
   * Changes a branch abbreviation into a collection name and version.
   *
   * @example
   * canonicalBranchName('FC-6') // ['Fedora', '6']
   */
  canonicalBranchName(branch: string): [collection: string, version: string] {
    if (branch === 'devel') {
      return ['Fedora', 'devel'];
    }
    const separator = branch.indexOf('-');
    const prefix = separator === -1 ? branch : branch.slice(0, separator);
    const version = separator === -1 ? '' : branch.slice(separator + 1);
    const collection = COLLECTION_MAP[prefix];
    if (!collection || !version || version.includes('-')) {
      throw new PackageDBError(
        `Collection abbreviation ${prefix} is unknown. Use F, FC, EL, or OLPC`
      );
    }
    return [collection, version];
  }

  /**
   * Package ownership information, optionally restricted to one branch.
   *
   * @throws AppError If the server reports an error
   */
  async getPackageInfo(pkg: string, branch?: string): Promise<JsonObject> {
    let params: RequestParams | undefined;
    if (branch) {
      const [collectionName, collectionVersion] = this.canonicalBranchName(branch);
      params = { collectionName, collectionVersion };
    }
    const pkgInfo = await this.sendRequest(`/acls/name/${pkg}`, { params });
    return checkStatus(pkgInfo);
  }

  /**
   * Sets a branch's permissions from a pre-existing branch.
   */
  async cloneBranch(pkg: string, branch: string, master: string, emailLog = true): Promise<JsonObject> {
    return this.sendRequest(`/acls/dispatcher/clone_branch/${pkg}/${branch}/${master}`, {
      auth: true,
      params: { email_log: emailLog },
    });
  }

  /**
   * Branches all unblocked packages for a new release.
   * Mass branching always works against the devel branch.
   */
  async massBranch(branch: string): Promise<JsonObject> {
    return this.sendRequest(`/collections/mass_branch/${branch}`, { auth: true });
  }

  /**
   * Adds a package to the database, then applies any extra fields with
   * a follow-up edit.
   *
   * @throws AppError If no owner is given or the server reports an error
   */
  async addPackage(pkg: string, options: PackageEditOptions = {}): Promise<void> {
    if (!options.owner) {
      throw new AppError(
        'AppError',
        `We do not have enough information to create package ${pkg}. Need version owner.`
      );
    }

    const response = await this.sendRequest(`/acls/dispatcher/add_package/${pkg}`, {
      auth: true,
      params: { owner: options.owner, summary: options.description },
    });
    checkStatus(response, (msg) => `PackageDB returned an error creating ${pkg}: ${msg}`);

    const { ccList, comaintainers, groups, branches } = options;
    if (ccList?.length || comaintainers?.length || groups?.length || branches?.length) {
      await this.editPackage(pkg, { ...options, owner: undefined });
    }
  }

  /**
   * Edits a package's owner, description, watchers, comaintainers, groups
   * or branches.
   *
   * @throws AppError If the server reports an error
   */
  async editPackage(pkg: string, options: PackageEditOptions): Promise<void> {
    const params: RequestParams = {};
    if (options.owner) params['owner'] = options.owner;
    if (options.description) params['summary'] = options.description;
    if (options.ccList?.length) params['ccList'] = JSON.stringify(options.ccList);
    if (options.comaintainers?.length) params['comaintList'] = JSON.stringify(options.comaintainers);
    if (options.groups?.length) params['groups'] = JSON.stringify(options.groups);
    if (options.branches?.length) params['collections'] = options.branches;

    const response = await this.sendRequest(`/acls/dispatcher/edit_package/${pkg}`, {
      auth: true,
      params,
    });
    checkStatus(response, (msg) => `Unable to save all information for ${pkg}: ${msg}`);
  }

  /**
   * Ownership information for a package, optionally limited to one
   * collection ('Fedora', 'Fedora EPEL', ...) and version.
   */
  async getOwners(pkg: string, collctnName?: string, collctnVer?: string): Promise<JsonObject> {
    const response = await this.sendRequest(
      appendCollectionPath(`/acls/name/${pkg}`, collctnName, collctnVer)
    );
    return checkStatus(response);
  }

  /**
   * Removes a user from a package, in the given collections or in all of
   * them.
   */
  async removeUser(username: string, pkgName: string, collctnList?: string[]): Promise<JsonObject> {
    const params: RequestParams = { username, pkg_name: pkgName };
    if (collctnList?.length) {
      params['collectn_list'] = collctnList;
    }
    return this.sendRequest('/acls/dispatcher/remove_user', { auth: true, params });
  }

  /**
   * Packages a user holds ACLs on. Packages in end-of-life releases are
   * only included when `eol` is set.
   */
  async userPackages(username: string, acls?: PackageAcl[], eol = false): Promise<JsonObject> {
    const params: RequestParams = { eol, tg_paginate_limit: 0 };
    if (acls?.length) {
      params['acls'] = acls;
    }
    return this.sendRequest(`/users/packages/${username}`, { params });
  }

  /**
   * Packages that are orphaned in any non-EOL release.
   */
  async orphanPackages(): Promise<JsonValue[]> {
    const data = await this.sendRequest('/acls/orphans', { params: { tg_paginate_limit: 0 } });
    return requireArray(data, 'pkgs');
  }

  /**
   * All collections; end-of-life ones are dropped when `eol` is false.
   */
  async getCollectionList(eol = true): Promise<CollectionEntry[]> {
    const data = await this.sendRequest('/collections/');
    const collections = requireCollections(data);
    if (eol) {
      return collections;
    }
    return collections.filter(([collection]) => collection.statuscode !== EOL_STATUS_CODE);
  }

  /**
   * Names of all packages in a collection (short name like 'devel' or
   * 'F-13'), or in every collection when none is given.
   *
   * @throws PackageDBError If the collection short name is unknown
   */
  async getPackageList(collctn?: string): Promise<string[]> {
    const params: RequestParams = { tg_paginate_limit: '0' };
    let data: JsonObject;
    if (collctn) {
      const branches = await this.getBranches();
      if (!branches[collctn]) {
        throw new PackageDBError(`Collection shortname ${collctn} is unknown.`);
      }
      data = await this.sendRequest(`/collections/name/${collctn}/`, { params });
    } else {
      data = await this.sendRequest('/acls/list/*', { params });
    }
    return requireArray(data, 'packages').flatMap((pkg) =>
      isJsonObject(pkg) && typeof pkg['name'] === 'string' ? [pkg['name']] : []
    );
  }

  /**
   * ACLs for the version control system, keyed by package then branch.
   */
  async getVcsAcls(): Promise<JsonValue> {
    const data = await this.sendRequest('/lists/vcs');
    return requireField(data, 'packageAcls');
  }

  /**
   * Package attributes used by the bug tracker, keyed by collection then
   * package.
   */
  async getBugzillaAcls(): Promise<JsonValue> {
    const data = await this.sendRequest('/lists/bugzilla');
    return requireField(data, 'bugzillaAcls');
  }

  /**
   * People to notify for each package, optionally limited to a collection.
   */
  async getNotifyAcls(collctnName?: string, collctnVer?: string, eol = false): Promise<JsonValue> {
    const data = await this.sendRequest(appendCollectionPath('/lists/notify', collctnName, collctnVer), {
      params: { eol },
    });
    return requireField(data, 'packages');
  }

  /**
   * Names of critical path packages, keyed by collection short name.
   */
  async getCritpathPkgs(collctnList?: string[]): Promise<JsonValue> {
    const params: RequestParams = {};
    if (collctnList?.length) {
      params['collctn_list'] = collctnList;
    }
    const data = await this.sendRequest('/lists/critpath', { params });
    return requireField(data, 'pkgs');
  }

  /**
   * Marks packages as being in (or out of) the critical path.
   */
  async setCritpath(options: SetCritpathOptions = {}): Promise<void> {
    const params: RequestParams = {
      critpath: options.critpath ?? true,
      reset: options.reset ?? false,
    };
    if (options.pkgList?.length) params['pkg_list'] = options.pkgList;
    if (options.collctnList?.length) params['collctn_list'] = options.collctnList;

    await this.sendRequest('/acls/dispatcher/set_critpath', { auth: true, params });
  }
}
