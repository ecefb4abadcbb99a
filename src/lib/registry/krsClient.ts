/**
 * KRS registry HTTP client.
 *
 * - Requests are spaced to at most `rateLimitPerSecond`, including concurrent
 *   callers (the spacing step runs one caller at a time).
 * - HTTP 429 is retried after `retryDelayMs`, up to `maxRetries` times.
 * - Every response is validated (zod) and mapped to registry types; a body
 *   that does not parse raises REGISTRY_RESPONSE_INVALID.
 * - fetch/sleep/clock are injectable for tests.
 */

import pLimit from "p-limit";
import type { z, ZodTypeAny } from "zod";
import {
  BeneficialOwnersResponseSchema,
  RegistryEntitySchema,
  RegistrySearchResultSchema,
  RepresentativesResponseSchema,
  SectionResponseSchema,
  ShareholdersResponseSchema,
  type EntitySearch,
  type RegistryEntity,
  type RegistryRepresentative,
  type RegistrySearchResult,
  type RegistryShareholder,
  type RegistrySource,
} from "./types";

export const DEFAULT_KRS_BASE_URL = "https://prs.ms.gov.pl/krs/openApi";

export type RegistryErrorCode = "REGISTRY_HTTP_ERROR" | "REGISTRY_RESPONSE_INVALID";

export class RegistryRequestError extends Error {
  readonly code: RegistryErrorCode;
  readonly status?: number;

  constructor(code: RegistryErrorCode, message: string, status?: number) {
    super(message);
    this.name = "RegistryRequestError";
    this.code = code;
    this.status = status;
  }
}

type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface KrsClientOpts {
  baseUrl?: string;
  rateLimitPerSecond?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  fetchImpl?: FetchImpl;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
  logger?: Pick<Console, "log" | "warn" | "error">;
}

export interface KrsClient extends RegistrySource {
  getEntitySection(krs: string, section: number): Promise<Record<string, unknown>>;
  getBeneficialOwners(krs: string): Promise<Array<Record<string, unknown>>>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createKrsClient(opts: KrsClientOpts = {}): KrsClient {
  const baseUrl = (opts.baseUrl ?? DEFAULT_KRS_BASE_URL).replace(/\/+$/, "");
  const minIntervalMs = 1000 / Math.max(1, opts.rateLimitPerSecond ?? 5);
  const maxRetries = opts.maxRetries ?? 3;
  const retryDelayMs = opts.retryDelayMs ?? 5_000;
  const fetchImpl: FetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  const sleep = opts.sleep ?? defaultSleep;
  const clock = opts.clock ?? (() => Date.now());
  const logger = opts.logger ?? console;

  let lastRequestAt: number | null = null;
  const serial = pLimit(1);

  function throttle(): Promise<void> {
    return serial(async () => {
      if (lastRequestAt !== null) {
        const wait = lastRequestAt + minIntervalMs - clock();
        if (wait > 0) await sleep(wait);
      }
      lastRequestAt = clock();
    });
  }

  async function getJson(endpoint: string, params?: Record<string, string>): Promise<unknown> {
    const query = params && Object.keys(params).length > 0 ? `?${new URLSearchParams(params)}` : "";
    const url = `${baseUrl}/${endpoint}${query}`;

    for (let attempt = 0; ; attempt++) {
      await throttle();
      const res = await fetchImpl(url, {
        method: "GET",
        headers: { accept: "application/json", "content-type": "application/json" },
      });

      if (res.status === 429 && attempt < maxRetries) {
        logger.warn(`[registry] rate limited on ${endpoint}; retrying in ${retryDelayMs}ms`);
        await sleep(retryDelayMs);
        continue;
      }
      if (!res.ok) {
        throw new RegistryRequestError("REGISTRY_HTTP_ERROR", `GET ${endpoint} failed: http_${res.status}`, res.status);
      }
      try {
        return await res.json();
      } catch (err) {
        throw new RegistryRequestError(
          "REGISTRY_RESPONSE_INVALID",
          `GET ${endpoint}: response is not JSON (${err instanceof Error ? err.message : String(err)})`,
          res.status,
        );
      }
    }
  }

  async function fetchParsed<S extends ZodTypeAny>(
    schema: S,
    endpoint: string,
    params?: Record<string, string>,
  ): Promise<z.output<S>> {
    const body = await getJson(endpoint, params);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new RegistryRequestError(
        "REGISTRY_RESPONSE_INVALID",
        `GET ${endpoint}: unexpected response shape (${parsed.error.issues.map((i) => i.path.join(".")).join(", ")})`,
      );
    }
    return parsed.data;
  }

  return {
    searchEntity(search: EntitySearch): Promise<RegistrySearchResult> {
      const params: Record<string, string> = {};
      if (search.krs) params.krs = search.krs;
      if (search.nip) params.nip = search.nip;
      if (search.regon) params.regon = search.regon;
      if (search.name) params.nazwa = search.name;
      return fetchParsed(RegistrySearchResultSchema, "podmiot/szukaj", params);
    },

    getEntityDetails(krs: string): Promise<RegistryEntity> {
      return fetchParsed(RegistryEntitySchema, `podmiot/${encodeURIComponent(krs)}`);
    },

    async getEntitySection(krs: string, section: number): Promise<Record<string, unknown>> {
      if (!Number.isInteger(section) || section < 1 || section > 6) {
        throw new RangeError("Section number must be between 1 and 6");
      }
      return fetchParsed(SectionResponseSchema, `podmiot/${encodeURIComponent(krs)}/dzial/${section}`);
    },

    getEntityRepresentatives(krs: string): Promise<RegistryRepresentative[]> {
      return fetchParsed(RepresentativesResponseSchema, `podmiot/${encodeURIComponent(krs)}/reprezentanci`);
    },

    getEntityShareholders(krs: string): Promise<RegistryShareholder[]> {
      return fetchParsed(ShareholdersResponseSchema, `podmiot/${encodeURIComponent(krs)}/wspolnicy`);
    },

    getBeneficialOwners(krs: string): Promise<Array<Record<string, unknown>>> {
      return fetchParsed(BeneficialOwnersResponseSchema, `podmiot/${encodeURIComponent(krs)}/beneficjenci`);
    },
  };
}
