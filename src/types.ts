export type IpVersion = 4 | 6;

/** 0 is auto: IPv6 first, then IPv4. */
export type IpMode = 0 | IpVersion;

export type ResolvedAddress = string;

export interface LookupTarget {
  host: string;
  port: number;
}

export interface CliConfig {
  readonly ipVersion: IpMode;
  readonly failureMessage: string;
  readonly timeoutMs?: number;
  readonly verbose: boolean;
}
