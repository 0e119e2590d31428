import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { buildFindMatchingQuery, escapeLike, escapeRegex } from "../PostgresProviderRepository";

describe("escapeLike", () => {
  it("escapes LIKE wildcards and the escape character", () => {
    assert.equal(escapeLike("50%_off\\"), "50\\%\\_off\\\\");
  });
});

describe("escapeRegex", () => {
  it("escapes regex metacharacters", () => {
    assert.equal(escapeRegex("w/o (mcc)"), "w/o \\(mcc\\)");
  });
});

describe("buildFindMatchingQuery", () => {
  it("parameterizes every condition and filter", () => {
    const { text, params } = buildFindMatchingQuery({
      conditions: [
        { kind: "startsWith", value: "470 " },
        { kind: "word", value: "470" },
        { kind: "contains", value: "joint" },
      ],
      zipPrefix: "100",
      city: "New York",
      orderBy: "cheapest",
      limit: 5,
    });

    assert.ok(
      text.includes(
        "WHERE (p.ms_drg_definition ILIKE $1 OR p.ms_drg_definition ~* $2 OR p.ms_drg_definition ILIKE $3)\n" +
          "    AND p.provider_zip_code LIKE $4\n" +
          "    AND UPPER(p.provider_city) = UPPER($5)",
      ),
    );
    assert.ok(text.endsWith("ORDER BY p.average_covered_charges ASC, p.provider_id ASC\n  LIMIT $6"));
    assert.deepEqual(params, ["470 %", "(^|[^a-z0-9])470($|[^a-z0-9])", "%joint%", "100%", "New York", 5]);
  });

  it("omits WHERE and LIMIT for an open filter", () => {
    const { text, params } = buildFindMatchingQuery({});
    assert.equal(text.includes("WHERE"), false);
    assert.ok(text.endsWith("ORDER BY p.provider_id ASC, p.ms_drg_definition ASC"));
    assert.deepEqual(params, []);
  });

  it("restricts to rated providers without a parameter", () => {
    const { text, params } = buildFindMatchingQuery({ ratedOnly: true, orderBy: "best_rated" });
    assert.ok(text.includes("WHERE r.avg_rating IS NOT NULL"));
    assert.ok(text.endsWith("ORDER BY r.avg_rating DESC NULLS LAST, p.provider_id ASC"));
    assert.deepEqual(params, []);
  });
});
