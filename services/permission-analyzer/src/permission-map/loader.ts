import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { Storage } from "@google-cloud/storage";
import { z } from "zod";
import { API_VERSIONS, type ApiVersion } from "../activity/types";
import type {
  EndpointEntry,
  PermissionDescriptor,
  PermissionMapDocuments,
  ScopeType,
} from "./types";

/** File names written by the permissions extractor. */
export const DOCUMENT_FILES: Record<ApiVersion, string> = {
  "v1.0": "permissions-v1.0.json",
  beta: "permissions-beta.json",
};

export type PermissionMapSource =
  | { kind: "file"; directory: string }
  | { kind: "gcs"; bucket: string; prefix?: string };

const permissionSchema = z.object({
  value: z.string().min(1),
  scopeType: z.string(),
  isLeastPrivilege: z.boolean().optional(),
});

const endpointSchema = z.object({
  Endpoint: z.string().min(1),
  Version: z.string(),
  Method: z.record(z.array(permissionSchema)),
});

const documentSchema = z.array(endpointSchema);

type RawPermission = z.infer<typeof permissionSchema>;

/**
 * The reference distinguishes DelegatedWork and DelegatedPersonal; both are
 * user-context scopes here. Unknown scope types are dropped.
 */
function toScopeType(raw: string): ScopeType | null {
  const normalized = raw.toLowerCase();
  if (normalized === "application") return "Application";
  if (normalized.startsWith("delegated")) return "Delegated";
  return null;
}

function toDescriptors(permissions: RawPermission[]): PermissionDescriptor[] {
  const descriptors: PermissionDescriptor[] = [];
  for (const p of permissions) {
    const scopeType = toScopeType(p.scopeType);
    if (!scopeType) continue;
    descriptors.push({
      name: p.value,
      scopeType,
      isLeastPrivileged: p.isLeastPrivilege ?? false,
    });
  }
  return descriptors;
}

/**
 * Validate one extractor document and keep the entries of the given version.
 */
export function parsePermissionMapDocument(
  raw: unknown,
  version: ApiVersion,
): EndpointEntry[] {
  const document = documentSchema.parse(raw);

  return document
    .filter((endpoint) => endpoint.Version === version)
    .map((endpoint) => {
      const perMethodPermissions: Record<string, PermissionDescriptor[]> = {};
      for (const [method, permissions] of Object.entries(endpoint.Method)) {
        perMethodPermissions[method.toUpperCase()] = toDescriptors(permissions);
      }
      return { canonicalPath: endpoint.Endpoint, perMethodPermissions };
    });
}

async function readDocument(
  source: PermissionMapSource,
  fileName: string,
): Promise<string> {
  if (source.kind === "gcs") {
    const path = source.prefix ? `${source.prefix}/${fileName}` : fileName;
    const storage = new Storage();
    const [contents] = await storage.bucket(source.bucket).file(path).download();
    return contents.toString();
  }

  return readFile(join(source.directory, fileName), "utf-8");
}

/**
 * Load the v1.0 and beta reference documents from disk or a GCS bucket.
 */
export async function loadPermissionMapDocuments(
  source: PermissionMapSource,
): Promise<PermissionMapDocuments> {
  const [v1, beta] = await Promise.all(
    API_VERSIONS.map(async (version) => {
      const contents = await readDocument(source, DOCUMENT_FILES[version]);
      return parsePermissionMapDocument(JSON.parse(contents), version);
    }),
  );

  return { "v1.0": v1, beta };
}
