import type { ApiVersion } from "../activity/types";

export type ScopeType = "Application" | "Delegated";

export interface PermissionDescriptor {
  name: string;
  scopeType: ScopeType;
  isLeastPrivileged: boolean;
}

/**
 * Permissions that authorize each HTTP method of one endpoint.
 * Method keys are upper-case.
 */
export interface EndpointEntry {
  canonicalPath: string;
  perMethodPermissions: Record<string, PermissionDescriptor[]>;
}

export type PermissionMapDocuments = Record<ApiVersion, EndpointEntry[]>;

/**
 * Read-only lookup over the endpoint → permission reference.
 */
export interface PermissionMapIndex {
  /** Entry for the path, whatever methods it documents. */
  lookup(version: ApiVersion, canonicalPath: string): EndpointEntry | undefined;
  /** Entry for the path when it documents the given method. */
  find(
    version: ApiVersion,
    method: string,
    canonicalPath: string,
  ): EndpointEntry | undefined;
  size(version: ApiVersion): number;
}
