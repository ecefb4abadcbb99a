/**
 * Offline RegistrySource backed by canned responses.
 *
 * Keys follow `<kind>:<value>`:
 *   details:<krs>, reprezentanci:<krs>, wspolnicy:<krs>,
 *   search:krs:<krs>, search:nip:<nip>, search:regon:<regon>, search:name:<name>,
 *   search:default
 * Bodies are the raw (Polish-field) responses and go through the same schemas
 * as the HTTP client.
 */

import { z } from "zod";
import mockResponses from "./fixtures/mockResponses.json";
import { RegistryRequestError } from "./krsClient";
import {
  RegistryEntitySchema,
  RegistrySearchResultSchema,
  RepresentativesResponseSchema,
  ShareholdersResponseSchema,
  type EntitySearch,
  type RegistrySource,
} from "./types";

const ResponsesSchema = z.record(z.unknown());

export type MockResponses = z.infer<typeof ResponsesSchema>;

export const DEFAULT_MOCK_RESPONSES: MockResponses = ResponsesSchema.parse(mockResponses);

function searchKey(query: EntitySearch): string {
  if (query.krs) return `search:krs:${query.krs}`;
  if (query.nip) return `search:nip:${query.nip}`;
  if (query.regon) return `search:regon:${query.regon}`;
  if (query.name) return `search:name:${query.name}`;
  return "search:default";
}

export function createMockRegistrySource(responses: MockResponses = DEFAULT_MOCK_RESPONSES): RegistrySource {
  const lookup = (key: string): unknown => (key in responses ? responses[key] : undefined);

  return {
    async searchEntity(query) {
      const body = lookup(searchKey(query)) ?? lookup("search:default") ?? {};
      return RegistrySearchResultSchema.parse(body);
    },

    async getEntityDetails(krs) {
      const body = lookup(`details:${krs}`);
      if (body === undefined) {
        throw new RegistryRequestError("REGISTRY_HTTP_ERROR", `GET podmiot/${krs} failed: http_404`, 404);
      }
      return RegistryEntitySchema.parse(body);
    },

    async getEntityRepresentatives(krs) {
      return RepresentativesResponseSchema.parse(lookup(`reprezentanci:${krs}`) ?? {});
    },

    async getEntityShareholders(krs) {
      return ShareholdersResponseSchema.parse(lookup(`wspolnicy:${krs}`) ?? {});
    },
  };
}
