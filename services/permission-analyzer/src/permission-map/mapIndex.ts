import { API_VERSIONS, type ApiVersion } from "../activity/types";
import { canonicalizePath } from "../activity/canonicalize";
import type {
  EndpointEntry,
  PermissionDescriptor,
  PermissionMapDocuments,
  PermissionMapIndex,
} from "./types";

export function descriptorKey(descriptor: PermissionDescriptor): string {
  return `${descriptor.scopeType}:${descriptor.name}`;
}

function mergeDescriptors(
  existing: PermissionDescriptor[],
  incoming: PermissionDescriptor[],
): PermissionDescriptor[] {
  const seen = new Set(existing.map(descriptorKey));
  const merged = [...existing];
  for (const descriptor of incoming) {
    const key = descriptorKey(descriptor);
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(descriptor);
  }
  return merged;
}

/**
 * Key entries by canonical path. Reference paths that collapse onto the same
 * pattern (`/me/messages` and `/users/{user-id}/messages`) are merged, the
 * first occurrence of a permission winning.
 */
function buildVersionIndex(
  entries: EndpointEntry[],
): ReadonlyMap<string, EndpointEntry> {
  const byPath = new Map<string, EndpointEntry>();

  for (const entry of entries) {
    const canonicalPath = canonicalizePath(entry.canonicalPath);
    const perMethodPermissions: Record<string, PermissionDescriptor[]> = {
      ...byPath.get(canonicalPath)?.perMethodPermissions,
    };

    for (const [method, descriptors] of Object.entries(entry.perMethodPermissions)) {
      const key = method.toUpperCase();
      const existing: PermissionDescriptor[] | undefined = perMethodPermissions[key];
      perMethodPermissions[key] = mergeDescriptors(existing ?? [], descriptors);
    }

    byPath.set(canonicalPath, { canonicalPath, perMethodPermissions });
  }

  return byPath;
}

/**
 * Build the lookup once per process; it is never mutated afterwards and is
 * safe to share between workers.
 */
export function createPermissionMapIndex(
  documents: PermissionMapDocuments,
): PermissionMapIndex {
  const versions = new Map<ApiVersion, ReadonlyMap<string, EndpointEntry>>(
    API_VERSIONS.map((version) => [version, buildVersionIndex(documents[version])]),
  );

  function lookup(version: ApiVersion, path: string): EndpointEntry | undefined {
    return versions.get(version)?.get(canonicalizePath(path));
  }

  return {
    lookup,

    find(version, method, path) {
      const entry = lookup(version, path);
      if (!entry) return undefined;
      const descriptors: PermissionDescriptor[] | undefined =
        entry.perMethodPermissions[method.toUpperCase()];
      return descriptors ? entry : undefined;
    },

    size(version) {
      return versions.get(version)?.size ?? 0;
    },
  };
}
