import test from "node:test";
import assert from "node:assert/strict";

import { RegistryRequestError, createKrsClient, type KrsClientOpts } from "../krsClient";

// ─── Helpers ─────────────────────────────────────────────────────────────────

type Reply = { status: number; body: unknown };

function harness(replies: Reply[], opts: Partial<KrsClientOpts> = {}) {
  const calls: Array<{ url: string; init?: RequestInit }> = [];
  const sleeps: number[] = [];
  const warnings: string[] = [];
  let now = 0;
  const queue = [...replies];

  const client = createKrsClient({
    baseUrl: "https://registry.test/",
    fetchImpl: async (url, init) => {
      calls.push({ url, init });
      const reply = queue.shift();
      if (!reply) throw new Error(`unexpected request ${url}`);
      return new Response(JSON.stringify(reply.body), { status: reply.status });
    },
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    },
    clock: () => now,
    logger: { log() {}, error() {}, warn: (msg: string) => warnings.push(msg) },
    ...opts,
  });

  return { client, calls, sleeps, warnings };
}

const ENTITY = {
  krs: "0000100001",
  nazwa: "ALFA HOLDING SPÓŁKA AKCYJNA",
  nip: "1110000011",
  regon: "100000011",
  status: "Aktywny",
  adres: "ul. Przykładowa 1, 00-001 Warszawa",
};

// ─── Parsing ─────────────────────────────────────────────────────────────────

test("getEntityDetails: maps registry fields", async () => {
  const { client, calls } = harness([{ status: 200, body: ENTITY }]);

  const entity = await client.getEntityDetails("0000100001");

  assert.equal(calls[0].url, "https://registry.test/podmiot/0000100001");
  assert.deepEqual(entity, {
    krs: "0000100001",
    name: "ALFA HOLDING SPÓŁKA AKCYJNA",
    nip: "1110000011",
    regon: "100000011",
    status: "Aktywny",
    address: "ul. Przykładowa 1, 00-001 Warszawa",
    legalForm: undefined,
    registrationDate: undefined,
  });
});

test("requests send JSON headers", async () => {
  const { client, calls } = harness([{ status: 200, body: ENTITY }]);
  await client.getEntityDetails("0000100001");
  assert.equal(calls[0].init?.method, "GET");
  assert.deepEqual(calls[0].init?.headers, { accept: "application/json", "content-type": "application/json" });
});

test("searchEntity: query parameters use registry names", async () => {
  const { client, calls } = harness([{ status: 200, body: { wyniki: [ENTITY], liczbaWynikow: 1 } }]);

  const result = await client.searchEntity({ name: "Alfa" });

  assert.equal(calls[0].url, "https://registry.test/podmiot/szukaj?nazwa=Alfa");
  assert.equal(result.total, 1);
  assert.equal(result.results[0].name, "ALFA HOLDING SPÓŁKA AKCYJNA");
});

test("searchEntity: total falls back to result count", async () => {
  const { client } = harness([{ status: 200, body: { wyniki: [ENTITY] } }]);
  const result = await client.searchEntity({ krs: "0000100001" });
  assert.equal(result.total, 1);
});

test("getEntityShareholders: percentages and types are normalized", async () => {
  const { client, calls } = harness([
    {
      status: 200,
      body: {
        wspolnicy: [
          { nazwa: "Beta Invest", typ: "corporate", udzialy: "62,5 %", krs: "0000100003" },
          { nazwa: "Jan Testowy", typ: "individual", udzialy: "n/a" },
        ],
      },
    },
  ]);

  const holders = await client.getEntityShareholders("0000100001");

  assert.equal(calls[0].url, "https://registry.test/podmiot/0000100001/wspolnicy");
  assert.deepEqual(holders, [
    { name: "Beta Invest", type: "company", percentage: 62.5, krs: "0000100003" },
    { name: "Jan Testowy", type: "individual", percentage: undefined, krs: undefined },
  ]);
});

test("getEntityRepresentatives: maps names and role", async () => {
  const { client } = harness([
    { status: 200, body: { reprezentanci: [{ imie: "Ewa", nazwisko: "Testowa", funkcja: "PREZES ZARZĄDU" }] } },
  ]);
  assert.deepEqual(await client.getEntityRepresentatives("0000100001"), [
    { firstName: "Ewa", lastName: "Testowa", role: "PREZES ZARZĄDU" },
  ]);
});

test("getBeneficialOwners: passes records through", async () => {
  const { client, calls } = harness([{ status: 200, body: { beneficjenci: [{ imie: "Ewa" }] } }]);
  assert.deepEqual(await client.getBeneficialOwners("0000100001"), [{ imie: "Ewa" }]);
  assert.equal(calls[0].url, "https://registry.test/podmiot/0000100001/beneficjenci");
});

test("getEntitySection: valid section hits the section endpoint", async () => {
  const { client, calls } = harness([{ status: 200, body: { rubryka: "x" } }]);
  assert.deepEqual(await client.getEntitySection("0000100001", 3), { rubryka: "x" });
  assert.equal(calls[0].url, "https://registry.test/podmiot/0000100001/dzial/3");
});

test("getEntitySection: section outside 1..6 is rejected without a request", async () => {
  const { client, calls } = harness([]);
  await assert.rejects(() => client.getEntitySection("0000100001", 7), RangeError);
  await assert.rejects(() => client.getEntitySection("0000100001", 0), RangeError);
  assert.equal(calls.length, 0);
});

// ─── Failures ────────────────────────────────────────────────────────────────

test("HTTP errors raise RegistryRequestError with status", async () => {
  const { client } = harness([{ status: 404, body: { message: "not found" } }]);
  await assert.rejects(
    () => client.getEntityDetails("0000999999"),
    (err: unknown) =>
      err instanceof RegistryRequestError &&
      err.code === "REGISTRY_HTTP_ERROR" &&
      err.status === 404 &&
      err.message === "GET podmiot/0000999999 failed: http_404",
  );
});

test("unexpected response shape raises REGISTRY_RESPONSE_INVALID", async () => {
  const { client } = harness([{ status: 200, body: { foo: "bar" } }]);
  await assert.rejects(
    () => client.getEntityDetails("0000100001"),
    (err: unknown) => err instanceof RegistryRequestError && err.code === "REGISTRY_RESPONSE_INVALID",
  );
});

test("non-JSON body raises REGISTRY_RESPONSE_INVALID", async () => {
  const client = createKrsClient({
    baseUrl: "https://registry.test",
    fetchImpl: async () => new Response("<html>maintenance</html>", { status: 200 }),
    sleep: async () => {},
  });

  await assert.rejects(
    () => client.getEntityDetails("0000100001"),
    (err: unknown) =>
      err instanceof RegistryRequestError &&
      err.code === "REGISTRY_RESPONSE_INVALID" &&
      err.status === 200 &&
      err.message.startsWith("GET podmiot/0000100001: response is not JSON"),
  );
});

test("429 is retried after the back-off delay", async () => {
  const { client, calls, sleeps, warnings } = harness(
    [
      { status: 429, body: {} },
      { status: 200, body: ENTITY },
    ],
    { retryDelayMs: 1000 },
  );

  const entity = await client.getEntityDetails("0000100001");

  assert.equal(entity.krs, "0000100001");
  assert.equal(calls.length, 2);
  assert.deepEqual(sleeps, [1000]);
  assert.deepEqual(warnings, ["[registry] rate limited on podmiot/0000100001; retrying in 1000ms"]);
});

test("429 gives up after maxRetries", async () => {
  const { client, calls } = harness(
    [
      { status: 429, body: {} },
      { status: 429, body: {} },
    ],
    { maxRetries: 1, retryDelayMs: 10 },
  );

  await assert.rejects(
    () => client.getEntityDetails("0000100001"),
    (err: unknown) => err instanceof RegistryRequestError && err.status === 429,
  );
  assert.equal(calls.length, 2);
});

// ─── Rate limiting ───────────────────────────────────────────────────────────

test("requests are spaced by the rate limit", async () => {
  const { client, sleeps } = harness(
    [
      { status: 200, body: ENTITY },
      { status: 200, body: ENTITY },
    ],
    { rateLimitPerSecond: 4 },
  );

  await client.getEntityDetails("0000100001");
  await client.getEntityDetails("0000100001");

  assert.deepEqual(sleeps, [250]);
});

test("concurrent requests are spaced one interval apart", async () => {
  const { client, calls, sleeps } = harness(
    [
      { status: 200, body: ENTITY },
      { status: 200, body: ENTITY },
      { status: 200, body: ENTITY },
    ],
    { rateLimitPerSecond: 4 },
  );

  await Promise.all([
    client.getEntityDetails("0000100001"),
    client.getEntityDetails("0000100001"),
    client.getEntityDetails("0000100001"),
  ]);

  assert.equal(calls.length, 3);
  assert.deepEqual(sleeps, [250, 250]);
});
