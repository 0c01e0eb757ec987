import { listPermissions } from "./capabilities.js";
import type {
  McpUiPermission,
  McpUiResourceCsp,
  McpUiResourceMeta,
} from "./types.js";

/**
 * CSP directives emitted by {@link buildSecurityPolicy}, in output order.
 */
export type McpUiCspDirective =
  | "default-src"
  | "script-src"
  | "style-src"
  | "img-src"
  | "font-src"
  | "media-src"
  | "connect-src"
  | "frame-src"
  | "base-uri"
  | "object-src";

/**
 * Border preference of a view: `true`, `false` or absent `prefersBorder`.
 */
export type McpUiBorderPreference =
  | "request-border"
  | "request-no-border"
  | "host-default";

/**
 * Security policy derived from a UI resource's metadata.
 */
export interface McpUiSecurityPolicy {
  /** Content-Security-Policy value */
  csp: string;
  /** Sources per directive, as joined into {@link csp} */
  directives: Readonly<Record<McpUiCspDirective, readonly string[]>>;
  /** Permissions granted to the view: requested ∩ host-granted */
  permissions: McpUiPermission[];
  /** Permission policy for the view frame's `allow` attribute */
  allow: string;
  /** Sandbox attribute for the view frame */
  sandbox: string;
  border: McpUiBorderPreference;
  /** Dedicated origin requested by the resource */
  domain?: string;
  /** Declared entries that are not valid CSP source expressions */
  rejectedSources: string[];
}

/**
 * Sandbox attribute for view frames. Scripts run, but top-level navigation and
 * popups stay blocked.
 */
export const DEFAULT_SANDBOX = "allow-scripts allow-same-origin allow-forms";

const SOURCE_EXPRESSION = /^[^\s;,'"]+$/;

function collectSources(
  declared: string[] | undefined,
  rejected: string[],
): string[] {
  const sources: string[] = [];
  for (const entry of declared ?? []) {
    if (!SOURCE_EXPRESSION.test(entry)) {
      rejected.push(entry);
    } else if (!sources.includes(entry)) {
      sources.push(entry);
    }
  }
  return sources;
}

function orDefault(sources: string[], fallback: string): string[] {
  return sources.length > 0 ? sources : [fallback];
}

/**
 * Derive the Content Security Policy and permission allow-list for a view.
 *
 * Every declared domain lands in its directive; an absent or empty axis falls
 * back to the restrictive default (`'none'` for connect and frame, `'self'`
 * for base-uri, same-origin and inline only for static resources).
 * `object-src` is always `'none'`.
 *
 * @param meta - `_meta.ui` of the resource contents, if any
 * @param options.grantedPermissions - Host-side permission upper bound
 *
 * @example
 * ```typescript
 * const policy = buildSecurityPolicy(
 *   { csp: { connectDomains: ["https://api.example.com"] } },
 *   { grantedPermissions: ["camera"] },
 * );
 * policy.directives["connect-src"]; // ["https://api.example.com"]
 * ```
 */
export function buildSecurityPolicy(
  meta: McpUiResourceMeta | undefined,
  options: { grantedPermissions?: readonly McpUiPermission[] } = {},
): McpUiSecurityPolicy {
  const rejectedSources: string[] = [];
  const csp = meta?.csp;
  const resource = collectSources(csp?.resourceDomains, rejectedSources);
  const connect = collectSources(csp?.connectDomains, rejectedSources);
  const frame = collectSources(csp?.frameDomains, rejectedSources);
  const baseUri = collectSources(csp?.baseUriDomains, rejectedSources);

  const directives: Record<McpUiCspDirective, readonly string[]> = {
    "default-src": ["'none'"],
    "script-src": ["'self'", "'unsafe-inline'", ...resource],
    "style-src": ["'self'", "'unsafe-inline'", ...resource],
    "img-src": ["'self'", "data:", ...resource],
    "font-src": ["'self'", "data:", ...resource],
    "media-src": ["'self'", "data:", ...resource],
    "connect-src": orDefault(connect, "'none'"),
    "frame-src": orDefault(frame, "'none'"),
    "base-uri": orDefault(baseUri, "'self'"),
    "object-src": ["'none'"],
  };

  const granted = options.grantedPermissions ?? [];
  const permissions = listPermissions(meta?.permissions).filter((permission) =>
    granted.includes(permission),
  );

  return {
    csp: Object.entries(directives)
      .map(([name, sources]) => `${name} ${sources.join(" ")}`)
      .join("; "),
    directives,
    permissions,
    allow: permissions.join("; "),
    sandbox: DEFAULT_SANDBOX,
    border:
      meta?.prefersBorder === undefined
        ? "host-default"
        : meta.prefersBorder
          ? "request-border"
          : "request-no-border",
    domain: meta?.domain,
    rejectedSources,
  };
}

function parseSource(source: string): { scheme?: string; host: string } {
  const match = source.match(/^(?:([a-z][a-z0-9+.-]*):\/\/)?([^/:]+)/i);
  return { scheme: match?.[1]?.toLowerCase(), host: match?.[2] ?? source };
}

/**
 * Whether a declared source is covered by an approved pattern: `*`, an exact
 * match, or a `*.suffix` wildcard (optionally with a scheme) covering
 * subdomains.
 */
export function isSourceApproved(source: string, pattern: string): boolean {
  if (pattern === "*" || pattern === source) {
    return true;
  }
  const wildcard = pattern.match(/^(?:([a-z][a-z0-9+.-]*):\/\/)?\*\.(.+)$/i);
  if (!wildcard) {
    return false;
  }
  const [, scheme, suffix] = wildcard;
  const target = parseSource(source);
  if (scheme && target.scheme !== scheme.toLowerCase()) {
    return false;
  }
  return target.host.toLowerCase().endsWith(`.${suffix.toLowerCase()}`);
}

const CSP_AXES: ReadonlyArray<keyof McpUiResourceCsp> = [
  "connectDomains",
  "resourceDomains",
  "frameDomains",
  "baseUriDomains",
];

/**
 * Restrict declared origins to those a host approves.
 *
 * Hosts call this before {@link buildSecurityPolicy} when they configure an
 * approved CSP. Axes the host leaves unconfigured are denied entirely.
 *
 * @returns The restricted CSP and every dropped entry, for logging
 */
export function restrictToApprovedDomains(
  declared: McpUiResourceCsp | undefined,
  approved: Readonly<McpUiResourceCsp>,
): { csp: McpUiResourceCsp; dropped: string[] } {
  const csp: McpUiResourceCsp = {};
  const dropped: string[] = [];
  for (const axis of CSP_AXES) {
    const sources = declared?.[axis];
    if (!sources) {
      continue;
    }
    const patterns = approved[axis] ?? [];
    const kept = sources.filter((source) =>
      patterns.some((pattern) => isSourceApproved(source, pattern)),
    );
    dropped.push(...sources.filter((source) => !kept.includes(source)));
    csp[axis] = kept;
  }
  return { csp, dropped };
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Insert the policy as a CSP `<meta>` tag at the start of `<head>`, or at the
 * start of the document when there is no `<head>`.
 */
export function injectSecurityPolicy(
  html: string,
  policy: McpUiSecurityPolicy,
): string {
  const tag = `<meta http-equiv="Content-Security-Policy" content="${escapeAttribute(policy.csp)}">`;
  if (/<head(\s[^>]*)?>/i.test(html)) {
    return html.replace(/<head(\s[^>]*)?>/i, (head) => `${head}\n${tag}`);
  }
  return tag + html;
}
