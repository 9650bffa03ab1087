import type { JsonObject, JsonValue } from '../http';
import type { BaseClientOptions } from '../base_client';
import type { PACKAGE_ACLS } from './collection_map';

/**
 * Options for PackageDB. `baseUrl` is optional and defaults to the public
 * package database instance.
 */
export type PackageDBOptions = Omit<BaseClientOptions, 'baseUrl'> & {
  baseUrl?: string | undefined;
};

/**
 * One collection (release branch) as listed by `collections/`.
 */
export type Collection = JsonObject & {
  id: number;
  name: string;
  version: string;
  branchname: string;
  statuscode?: number;
};

/**
 * `collections/` answers with pairs of [collection, package count].
 */
export type CollectionEntry = [Collection, ...JsonValue[]];

export type PackageEditOptions = {
  /** If set, make this person the owner of the branches */
  owner?: string | undefined;
  /** If set, make this the description of the branches */
  description?: string | undefined;
  /** Branches (collection short names) to operate on */
  branches?: string[] | undefined;
  /** Usernames to watch the package */
  ccList?: string[] | undefined;
  /** Usernames to comaintain the package */
  comaintainers?: string[] | undefined;
  /** Group names that can commit to the package */
  groups?: string[] | undefined;
};

export type SetCritpathOptions = {
  /** Package names to change. Default: every package in the collections */
  pkgList?: string[] | undefined;
  /** true (default) puts the packages in the critical path, false takes them out */
  critpath?: boolean | undefined;
  /** Collection short names to apply the change to. Default: all non-EOL collections */
  collctnList?: string[] | undefined;
  /** Clear the flag from all packages in the collections first */
  reset?: boolean | undefined;
};

/** ACL names accepted by `userPackages` */
export type PackageAcl = (typeof PACKAGE_ACLS)[number];
