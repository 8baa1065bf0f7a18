/**
 * Inbound webhook source and the signature scheme it signs with.
 *   timestamped  `t=<ts>,v1=<hex>` over `<ts>.<body>`
 *   hmac         hex HMAC of the raw body (optionally `sha256=` prefixed)
 */
export const SignatureScheme = {
  TIMESTAMPED: "timestamped",
  HMAC: "hmac",
} as const;

export type SignatureScheme = (typeof SignatureScheme)[keyof typeof SignatureScheme];

export interface IncomingSource {
  readonly name: string;
  readonly scheme: SignatureScheme;
  /** Lower-cased header carrying the signature */
  readonly header: string;
  readonly secret: string;
}
