/**
 * Credential handling for clone URLs
 */

/**
 * Insert a token as the userinfo of an HTTPS URL:
 * `https://host/x` becomes `https://<token>@host/x`
 */
export function urlWithToken(httpsUrl: string, token: string): string {
  return insertUserInfo(httpsUrl, encodeURIComponent(token.trim()));
}

/**
 * Insert `user:password` as the userinfo of an HTTPS URL
 */
export function urlWithBasicAuth(httpsUrl: string, user: string, password: string): string {
  return insertUserInfo(
    httpsUrl,
    `${encodeURIComponent(user.trim())}:${encodeURIComponent(password.trim())}`,
  );
}

function insertUserInfo(httpsUrl: string, userInfo: string): string {
  const schemeEnd = httpsUrl.indexOf("//");
  if (schemeEnd === -1) {
    throw new Error(`Not an absolute URL: ${httpsUrl}`);
  }

  const rest = httpsUrl.slice(schemeEnd + 2);
  // Drop any userinfo the host already put there
  const at = rest.indexOf("@");
  const slash = rest.indexOf("/");
  const hostPart = at !== -1 && (slash === -1 || at < slash) ? rest.slice(at + 1) : rest;

  return `${httpsUrl.slice(0, schemeEnd + 2)}${userInfo}@${hostPart}`;
}

/**
 * Replace every occurrence of each secret (raw and URL-encoded) with asterisks
 */
export function maskSecrets(content: string, secrets: readonly string[]): string {
  let masked = content;
  for (const secret of secrets) {
    if (!secret) continue;
    for (const variant of new Set([secret, encodeURIComponent(secret)])) {
      masked = masked.split(variant).join("*".repeat(5));
    }
  }
  return masked;
}

/**
 * Hostname of an API URL, e.g. `https://gitea.example.com/api/v1` → `gitea.example.com`
 */
export function hostnameOf(apiUrl: string): string {
  return new URL(apiUrl).hostname;
}
