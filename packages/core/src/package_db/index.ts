export { PackageDB, DEFAULT_PACKAGEDB_URL } from './package_db';
export { COLLECTION_MAP, EOL_STATUS_CODE, PACKAGE_ACLS } from './collection_map';
export type {
  PackageDBOptions,
  Collection,
  CollectionEntry,
  PackageEditOptions,
  SetCritpathOptions,
  PackageAcl,
} from './package_db.types';
