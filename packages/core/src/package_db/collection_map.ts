/**
 * Maps short collection names to collections. For instance, FC => Fedora.
 */
export const COLLECTION_MAP: Readonly<Record<string, string>> = {
  F: 'Fedora',
  FC: 'Fedora',
  EL: 'Fedora EPEL',
  EPEL: 'Fedora EPEL',
  OLPC: 'Fedora OLPC',
  RHL: 'Red Hat Linux',
};

/** Collection status code the server uses for end-of-life releases */
export const EOL_STATUS_CODE = 9;

/** ACL names a user can hold on a package */
export const PACKAGE_ACLS = ['owner', 'approveacls', 'commit', 'watchbugzilla', 'watchcommits'] as const;
