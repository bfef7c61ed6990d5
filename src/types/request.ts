/**
 * Runtime options and synthesized request types
 */

export type Scheme = 'http' | 'https';

/**
 * How array-valued query parameters are written.
 * repeat: tag=a&tag=b, brackets: tag[]=a, indices: tag[0]=a, comma: tag=a,b
 */
export type ArrayFormat = 'repeat' | 'brackets' | 'indices' | 'comma';

export interface HeaderField {
  name: string;
  value: string;
}

export interface RuntimeOptions {
  /** Target host, optionally with a `:port` suffix */
  host: string;
  scheme: Scheme;
  bearerToken?: string;
  /** Sent after the generated headers, in this order; names may repeat */
  extraHeaders?: HeaderField[];
  arrayFormat?: ArrayFormat;
}

export interface RequestTarget {
  host: string;
  port: number;
  secure: boolean;
}

export interface SynthesizedRequest {
  readonly requestLine: string;
  readonly headers: readonly HeaderField[];
  readonly body: Uint8Array;
  readonly target: RequestTarget;
}
