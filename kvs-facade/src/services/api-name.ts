/**
 * Convert an operation name to the control plane's API-name form.
 *
 * Word boundaries in PascalCase/camelCase become underscores and the result is
 * uppercased: `GetMedia` → `GET_MEDIA`, `GetHLSStreamingSessionURL` →
 * `GET_HLS_STREAMING_SESSION_URL`, `get_media` → `GET_MEDIA`, `Op` → `OP`.
 */
export function toApiName(operationName: string): string {
  return operationName
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toUpperCase();
}
