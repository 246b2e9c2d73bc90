/** Ordered header list; names keep the casing they arrived with */
export type HeaderEntries = Array<[name: string, value: string]>;

export interface ProxyRequest {
  method: string;
  path: string;
  /** Raw query string without the leading `?` */
  query: string;
  headers: HeaderEntries;
  body: Buffer;
}
