/**
 * Builds a Keycloak realm issuer, e.g. `https://sso.example.com/realms/myapp`.
 */
export function realmIssuer(baseUrl: string, realm: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/realms/${encodeURIComponent(realm)}`;
}

export function certsUrl(issuer: string): string {
  return `${issuer.replace(/\/+$/, '')}/protocol/openid-connect/certs`;
}

export function tokenUrl(issuer: string): string {
  return `${issuer.replace(/\/+$/, '')}/protocol/openid-connect/token`;
}
