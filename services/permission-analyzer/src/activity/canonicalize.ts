import {
  API_VERSIONS,
  type ApiVersion,
  type CanonicalActivity,
  type RawActivity,
} from "./types";

export const ID_PLACEHOLDER = "{id}";

const SCHEME_AND_HOST = /^([a-z][a-z0-9+.-]*:\/\/[^/]*)(.*)$/i;
const EMAIL_SEGMENT = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;
const DIGIT = /\d/;
const PLACEHOLDER = /\{[^}]*\}/;

/**
 * OData function names that carry digits, optionally namespaced, such as
 * `getOffice365ActiveUserDetail` or
 * `microsoft.graph.getM365AppUserDetail`. Only recognised in the
 * `<name>/{id}` tail the trailing-call rule produces.
 */
const FUNCTION_NAME = /^(?:[A-Za-z]+\.)*[a-z]+[A-Z][A-Za-z]*\d+[A-Za-z]+$/;

interface SplitUri {
  prefix: string;
  rooted: boolean;
  segments: string[];
}

function splitUri(uri: string): SplitUri {
  const withoutQuery = uri.split("?")[0];
  const match = SCHEME_AND_HOST.exec(withoutQuery);
  const prefix = match ? match[1] : "";
  const path = match ? match[2] : withoutQuery;

  return {
    prefix,
    rooted: prefix !== "" || path.startsWith("/"),
    segments: path.split("/").filter((s) => s !== ""),
  };
}

function joinUri({ prefix, rooted, segments }: SplitUri): string {
  if (segments.length === 0) {
    return prefix === "" && rooted ? "/" : prefix;
  }
  return `${prefix}${rooted ? "/" : ""}${segments.join("/")}`;
}

export function toApiVersion(segment: string): ApiVersion | undefined {
  return API_VERSIONS.find((v) => v === segment);
}

function looksLikeIdentifier(segment: string): boolean {
  return DIGIT.test(segment) || PLACEHOLDER.test(segment);
}

function isCanonicalFunctionName(segments: string[], i: number): boolean {
  return (
    i === segments.length - 2 &&
    segments[i + 1] === ID_PLACEHOLDER &&
    FUNCTION_NAME.test(segments[i])
  );
}

function canonicalizeSegments(segments: string[]): string[] {
  const out: string[] = [];

  segments.forEach((segment, i) => {
    if (segment.toLowerCase() === "me") {
      out.push("users", ID_PLACEHOLDER);
      return;
    }
    if (toApiVersion(segment)) {
      out.push(segment);
      return;
    }
    if (EMAIL_SEGMENT.test(segment)) {
      out.push(ID_PLACEHOLDER);
      return;
    }
    if (!looksLikeIdentifier(segment) || isCanonicalFunctionName(segments, i)) {
      out.push(segment);
      return;
    }

    // Trailing OData function call: keep the function name, drop its arguments
    const paren = segment.indexOf("(");
    if (i === segments.length - 1 && paren > 0) {
      out.push(segment.slice(0, paren), ID_PLACEHOLDER);
      return;
    }
    out.push(ID_PLACEHOLDER);
  });

  return out;
}

/**
 * Reduce a request URI to a version-stable, identifier-free pattern.
 *
 * https://graph.microsoft.com/v1.0/me/messages/AAMkAGI2?$top=5
 *   → https://graph.microsoft.com/v1.0/users/{id}/messages/{id}
 */
export function canonicalizeUri(uri: string): string {
  const trimmed = uri.trim();
  if (trimmed === "") return trimmed;

  const split = splitUri(trimmed);
  return joinUri({ ...split, segments: canonicalizeSegments(split.segments) });
}

/**
 * Split a raw activity into method, version and canonical path.
 * Returns null when the URI carries no `v1.0` or `beta` version segment.
 */
export function toCanonicalActivity(activity: RawActivity): CanonicalActivity | null {
  const { segments } = splitUri(canonicalizeUri(activity.uri));
  if (segments.length === 0) return null;

  const version = toApiVersion(segments[0]);
  if (!version) return null;

  return {
    method: activity.method.trim().toUpperCase(),
    version,
    path: `/${segments.slice(1).join("/")}`,
  };
}

/**
 * Canonicalize a path from the permission reference (no host, no version)
 * with the same identifier substitution applied to observed calls.
 */
export function canonicalizePath(path: string): string {
  return canonicalizeUri(path.startsWith("/") ? path : `/${path}`);
}

export function activityKey(activity: CanonicalActivity): string {
  return `${activity.method} ${activity.version} ${activity.path}`;
}
