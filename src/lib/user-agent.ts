import util from "@/lib/util.ts";

const CHROME_VERSIONS = ["130.0.0.0", "131.0.0.0", "132.0.0.0", "129.0.0.0"];
const FIREFOX_VERSIONS = ["133.0", "132.0", "131.0", "134.0"];
const SAFARI_VERSIONS = ["18.2", "18.1", "18.0", "17.6"];
const EDGE_VERSIONS = ["130.0.0.0", "131.0.0.0", "132.0.0.0"];

const MAX_CACHED_IDENTITIES = 1000;

type Random = () => number;
type AgentBuilder = (rng: Random) => string;

function pick<T>(rng: Random, items: readonly T[]): T {
  return items[Math.floor(rng() * items.length)];
}

function firefoxRv(rng: Random) {
  return `${pick(rng, FIREFOX_VERSIONS).split(".")[0]}.0`;
}

const PLATFORMS: AgentBuilder[][] = [
  [
    (rng) =>
      `Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${pick(rng, CHROME_VERSIONS)} Safari/537.36`,
    (rng) =>
      `Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:${firefoxRv(rng)}) Gecko/20100101 Firefox/${pick(rng, FIREFOX_VERSIONS)}`,
    (rng) =>
      `Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${pick(rng, CHROME_VERSIONS)} Safari/537.36 Edg/${pick(rng, EDGE_VERSIONS)}`,
  ],
  [
    (rng) =>
      `Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${pick(rng, CHROME_VERSIONS)} Safari/537.36`,
    (rng) =>
      `Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/${pick(rng, SAFARI_VERSIONS)} Safari/605.1.15`,
    (rng) =>
      `Mozilla/5.0 (Macintosh; Intel Mac OS X 14.${Math.floor(rng() * 8)}; rv:${firefoxRv(rng)}) Gecko/20100101 Firefox/${pick(rng, FIREFOX_VERSIONS)}`,
  ],
  [
    (rng) =>
      `Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${pick(rng, CHROME_VERSIONS)} Safari/537.36`,
    (rng) => `Mozilla/5.0 (X11; Linux x86_64; rv:${firefoxRv(rng)}) Gecko/20100101 Firefox/${pick(rng, FIREFOX_VERSIONS)}`,
    (rng) =>
      `Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:${firefoxRv(rng)}) Gecko/20100101 Firefox/${pick(rng, FIREFOX_VERSIONS)}`,
  ],
];

/** mulberry32 */
function seededRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const identities = new Map<string, string>();

function buildAgent(accountId: string): string {
  const rng = seededRandom(parseInt(util.md5(accountId).slice(0, 8), 16));
  const builder = pick(rng, pick(rng, PLATFORMS));
  return builder(rng);
}

/**
 * Stable browser User-Agent for an account: the same id always yields the
 * same string. An empty id gets a random one.
 */
export function accountIdentity(accountId?: string | null): string {
  if (!accountId) return buildAgent(`random_${util.randomInt(1, 999999)}`);
  const cached = identities.get(accountId);
  if (cached) return cached;
  const agent = buildAgent(accountId);
  if (identities.size >= MAX_CACHED_IDENTITIES) {
    const oldest = identities.keys().next();
    if (!oldest.done) identities.delete(oldest.value);
  }
  identities.set(accountId, agent);
  return agent;
}

/** Identity key of a credential: its first 16 characters. */
export function identityKey(credential: string | null | undefined): string | null {
  return credential ? credential.slice(0, 16) : null;
}
