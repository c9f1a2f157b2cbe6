/**
 * Mocha bootstrap keeping the suite hermetic:
 *
 * 1. `Math.random` is replaced by a seeded Park–Miller generator so retry
 *    jitter and any other randomness replay identically between runs.
 * 2. Outbound network access fails fast. `net.Socket#connect`,
 *    `tls.TLSSocket#connect` and the global `fetch` throw an
 *    `E-NETWORK-BLOCKED` error; adapters under test receive stubbed fetch
 *    implementations instead.
 *
 * Original implementations are restored once the run completes.
 */
import { after, before } from "mocha";
import { Socket } from "node:net";
import { TLSSocket } from "node:tls";

type RestoreHook = () => void;

const restores: RestoreHook[] = [];

export const DEFAULT_TEST_RANDOM_SEED = process.env.TEST_RANDOM_SEED ?? "polysearch::tests";

function deriveSeed(token: string): number {
  let hash = 0;
  for (let index = 0; index < token.length; index += 1) {
    hash = (hash * 31 + token.charCodeAt(index)) % 2147483647;
  }
  return hash === 0 ? 1 : hash;
}

export function createDeterministicRandom(seedToken = DEFAULT_TEST_RANDOM_SEED): () => number {
  const modulus = 2147483647;
  const multiplier = 48271;
  let state = deriveSeed(seedToken);
  return () => {
    state = (state * multiplier) % modulus;
    return (state - 1) / (modulus - 1);
  };
}

class NetworkBlockedError extends Error {
  readonly code = "E-NETWORK-BLOCKED";

  constructor(primitive: string) {
    super(`network access via ${primitive} is disabled during tests`);
    this.name = "NetworkBlockedError";
  }
}

function installDeterministicRandom(): void {
  const originalRandom = Math.random;
  const prng = createDeterministicRandom();
  Math.random = () => prng();
  restores.push(() => {
    Math.random = originalRandom;
  });
}

function installNetworkGuards(): void {
  const originalSocketConnect = Socket.prototype.connect;
  Socket.prototype.connect = function blockedConnect(): never {
    throw new NetworkBlockedError("net.Socket#connect");
  };
  restores.push(() => {
    Socket.prototype.connect = originalSocketConnect;
  });

  const originalTlsConnect = TLSSocket.prototype.connect;
  TLSSocket.prototype.connect = function blockedTlsConnect(): never {
    throw new NetworkBlockedError("tls.TLSSocket#connect");
  };
  restores.push(() => {
    TLSSocket.prototype.connect = originalTlsConnect;
  });

  const originalFetch = globalThis.fetch;
  globalThis.fetch = async () => {
    throw new NetworkBlockedError("fetch");
  };
  restores.push(() => {
    globalThis.fetch = originalFetch;
  });

  Reflect.set(globalThis, "__OFFLINE_TEST_GUARD__", "network-blocked");
  restores.push(() => {
    Reflect.deleteProperty(globalThis, "__OFFLINE_TEST_GUARD__");
  });
}

before(() => {
  installDeterministicRandom();
  installNetworkGuards();
});

after(() => {
  while (restores.length > 0) {
    restores.pop()?.();
  }
});
