import { AhrefsClient, ArxivClient, PaperStore, TopvisorClient } from "seobridge";
import type { Env, FetchLike, SetupCheckOptions } from "seobridge";

/**
 * Builds provider clients on demand. Clients are created per tool call so
 * a missing key surfaces as that call's configuration error rather than a
 * start-up failure.
 */
export interface ProviderFactory {
  topvisor(): TopvisorClient;
  ahrefs(): AhrefsClient;
  arxiv(): ArxivClient;
}

export interface ServerContext {
  providers: ProviderFactory;
  papers: PaperStore;
  /** Passed to the setup checks */
  setup: SetupCheckOptions;
}

export function envProviderFactory(env: Env = process.env, fetch?: FetchLike): ProviderFactory {
  return {
    topvisor: () => TopvisorClient.fromEnv(env, { fetch }),
    ahrefs: () => AhrefsClient.fromEnv(env, { fetch }),
    arxiv: () => new ArxivClient({ fetch }),
  };
}

export interface ContextOptions {
  env?: Env;
  papersDir: string;
  /** Directory searched for `.env` by the setup checks */
  cwd?: string;
  fetch?: FetchLike;
}

export function createContext(options: ContextOptions): ServerContext {
  const env = options.env ?? process.env;
  return {
    providers: envProviderFactory(env, options.fetch),
    papers: new PaperStore(options.papersDir),
    setup: { env, cwd: options.cwd, fetch: options.fetch },
  };
}
