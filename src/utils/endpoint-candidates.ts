const LOOPBACK_HOSTS: ReadonlySet<string> = new Set(["localhost", "127.0.0.1", "::1"]);
const LOOPBACK_HOST_CANDIDATES = ["localhost", "127.0.0.1", "[::1]"] as const;
const OPENAI_API_SUFFIX = "/v1";
const LMSTUDIO_API_SUFFIX = "/api/v0";
const SCHEME_PATTERN = /^[a-z][a-z\d+.-]*:\/\//i;

interface ParsedBaseUrl {
  protocol: string;
  hostname: string;
  port: string;
  path: string;
}

function stripTrailingSlashes(input: string): string {
  return input.replace(/\/+$/, "");
}

function parseBaseUrl(input: string): ParsedBaseUrl | null {
  const raw = input.trim();
  if (!raw) {
    return null;
  }

  const withScheme = SCHEME_PATTERN.test(raw) ? raw : `http://${raw}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    return null;
  }
  if (!url.hostname) {
    return null;
  }

  return {
    protocol: url.protocol,
    hostname: url.hostname,
    port: url.port,
    path: stripTrailingSlashes(url.pathname)
  };
}

function stripSuffix(input: string, suffix: string): string {
  return input.endsWith(suffix) ? input.slice(0, -suffix.length) : input;
}

function apiRoot(path: string): string {
  const withoutOpenAi = stripSuffix(path, OPENAI_API_SUFFIX);
  if (withoutOpenAi !== path) {
    return withoutOpenAi;
  }
  return stripSuffix(path, LMSTUDIO_API_SUFFIX);
}

function buildHostCandidates(hostname: string): string[] {
  const hosts = [hostname];
  const bare = hostname.replace(/^\[|\]$/g, "");
  if (LOOPBACK_HOSTS.has(bare)) {
    hosts.push(...LOOPBACK_HOST_CANDIDATES);
  }
  return hosts;
}

function buildPathCandidates(path: string): string[] {
  const root = apiRoot(path);
  return [path, `${root}${OPENAI_API_SUFFIX}`, `${root}${LMSTUDIO_API_SUFFIX}`, root];
}

function renderBaseUrl(protocol: string, host: string, port: string, path: string): string {
  // WHATWG URL keeps IPv6 literals bracketed, so the port can be appended as-is.
  const authority = port ? `${host}:${port}` : host;
  return stripTrailingSlashes(`${protocol}//${authority}${stripTrailingSlashes(path)}`);
}

export function uniqueInOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

export function normalizeBaseUrl(input: string): string {
  const parsed = parseBaseUrl(input);
  if (!parsed) {
    return stripTrailingSlashes(input.trim());
  }
  return renderBaseUrl(parsed.protocol, parsed.hostname, parsed.port, parsed.path);
}

/**
 * Expands one configured base URL into the API roots worth probing: the
 * loopback spellings of the host crossed with the `/v1` and `/api/v0` path
 * conventions. The configured host comes first.
 */
export function buildEndpointCandidates(baseUrl: string): string[] {
  const parsed = parseBaseUrl(baseUrl);
  if (!parsed) {
    const fallback = stripTrailingSlashes(baseUrl.trim());
    return fallback ? [fallback] : [];
  }

  const candidates: string[] = [];
  for (const host of buildHostCandidates(parsed.hostname)) {
    for (const path of buildPathCandidates(parsed.path)) {
      candidates.push(renderBaseUrl(parsed.protocol, host, parsed.port, path));
    }
  }
  return uniqueInOrder(candidates);
}
