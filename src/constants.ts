import type { IpVersion } from "./types";

export const Lookup = {
  HOST: "icanhazip.com",
  PORT: 80,
  RECV_BUFFER_SIZE: 2048,
};

export const Defaults = {
  FAILURE_MESSAGE: "service unreachable",
  PROGRAM: "ipline",
};

// Auto mode tries these in order, first success wins.
export const AUTO_ORDER: readonly IpVersion[] = [6, 4];
