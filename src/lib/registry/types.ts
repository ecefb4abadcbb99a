/**
 * Registry (KRS) record schemas.
 *
 * Raw responses use the register's Polish field names; each schema parses and
 * maps them onto the English, already-normalized shapes the rest of the
 * system consumes. Percentages are normalized here and nowhere else.
 */

import { z } from "zod";
import type { ShareholderType } from "@/lib/graph/types";
import { normalizePercentage } from "./percentage";

const optionalText = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

// ---------------------------------------------------------------------------
// Entity
// ---------------------------------------------------------------------------

export const RegistryEntitySchema = z
  .object({
    krs: z.string().min(1),
    nazwa: z.string().min(1),
    nip: optionalText,
    regon: optionalText,
    status: optionalText,
    adres: optionalText,
    formaPrawna: optionalText,
    dataRejestracji: optionalText,
  })
  .transform((raw) => ({
    krs: raw.krs.trim(),
    name: raw.nazwa.trim(),
    nip: raw.nip,
    regon: raw.regon,
    status: raw.status,
    address: raw.adres,
    legalForm: raw.formaPrawna,
    registrationDate: raw.dataRejestracji,
  }));

export type RegistryEntity = z.output<typeof RegistryEntitySchema>;

export const RegistrySearchResultSchema = z
  .object({
    wyniki: z.array(RegistryEntitySchema).default([]),
    liczbaWynikow: z.number().int().nonnegative().optional(),
  })
  .transform((raw) => ({
    results: raw.wyniki,
    total: raw.liczbaWynikow ?? raw.wyniki.length,
  }));

export type RegistrySearchResult = z.output<typeof RegistrySearchResultSchema>;

// ---------------------------------------------------------------------------
// Representatives
// ---------------------------------------------------------------------------

const RepresentativeSchema = z
  .object({
    imie: z.string().min(1),
    nazwisko: z.string().min(1),
    funkcja: optionalText,
  })
  .transform((raw) => ({
    firstName: raw.imie.trim(),
    lastName: raw.nazwisko.trim(),
    role: raw.funkcja,
  }));

export type RegistryRepresentative = z.output<typeof RepresentativeSchema>;

export const RepresentativesResponseSchema = z
  .object({ reprezentanci: z.array(RepresentativeSchema).default([]) })
  .transform((raw) => raw.reprezentanci);

// ---------------------------------------------------------------------------
// Shareholders
// ---------------------------------------------------------------------------

export function toShareholderType(raw: string | undefined): ShareholderType {
  const value = (raw ?? "").trim().toLowerCase();
  if (["individual", "person", "osoba fizyczna", "natural_person"].includes(value)) return "individual";
  if (["company", "corporate", "spolka", "spółka", "legal_person"].includes(value)) return "company";
  return "organization";
}

const ShareholderSchema = z
  .object({
    nazwa: z.string().min(1),
    typ: optionalText,
    udzialy: z.union([z.string(), z.number()]).nullish(),
    krs: optionalText,
  })
  .transform((raw) => ({
    name: raw.nazwa.trim(),
    type: toShareholderType(raw.typ),
    percentage: normalizePercentage(raw.udzialy),
    krs: raw.krs,
  }));

export type RegistryShareholder = z.output<typeof ShareholderSchema>;

export const ShareholdersResponseSchema = z
  .object({ wspolnicy: z.array(ShareholderSchema).default([]) })
  .transform((raw) => raw.wspolnicy);

// ---------------------------------------------------------------------------
// Beneficial owners & sections (passed through loosely)
// ---------------------------------------------------------------------------

export const BeneficialOwnersResponseSchema = z
  .object({ beneficjenci: z.array(z.record(z.unknown())).default([]) })
  .transform((raw) => raw.beneficjenci);

export const SectionResponseSchema = z.record(z.unknown());

// ---------------------------------------------------------------------------
// Source contract
// ---------------------------------------------------------------------------

export interface EntitySearch {
  krs?: string;
  nip?: string;
  regon?: string;
  name?: string;
}

/** What ingestion needs from a registry; implemented by the HTTP client and the mock. */
export interface RegistrySource {
  searchEntity(query: EntitySearch): Promise<RegistrySearchResult>;
  getEntityDetails(krs: string): Promise<RegistryEntity>;
  getEntityRepresentatives(krs: string): Promise<RegistryRepresentative[]>;
  getEntityShareholders(krs: string): Promise<RegistryShareholder[]>;
}
