/**
 * Tests for search filter construction.
 *
 * Run: node --import tsx --test src/speakers/filter.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { buildFilterExpression } from "./filter.js";

describe("buildFilterExpression", () => {
  it("returns undefined when no predicate is present", () => {
    assert.equal(buildFilterExpression({}), undefined);
  });

  it("returns a single clause bare", () => {
    assert.deepStrictEqual(buildFilterExpression({ name: " Smith " }), {
      property: "Name",
      title: { contains: "Smith" },
    });
  });

  it("AND-combines several clauses in a fixed order", () => {
    assert.deepStrictEqual(
      buildFilterExpression({ priority: "High", fieldSpecialty: "NLP in Healthcare" }),
      {
        and: [
          { property: "Field/Specialty", select: { equals: "NLP in Healthcare" } },
          { property: "Priority", select: { equals: "High" } },
        ],
      }
    );
  });

  it("skips blank text predicates", () => {
    assert.deepStrictEqual(buildFilterExpression({ name: "   ", affiliation: "Stanford" }), {
      property: "Affiliation",
      rich_text: { contains: "Stanford" },
    });
  });

  it("builds one clause per attribute", () => {
    const expression = buildFilterExpression({
      name: "Jane",
      fieldSpecialty: "Bioinformatics",
      affiliation: "MIT",
      contactStatus: "Contacted",
      priority: "Low",
    });
    assert.ok(expression !== undefined && "and" in expression);
    assert.deepStrictEqual(
      expression.and.map((condition) => condition.property),
      ["Name", "Field/Specialty", "Affiliation", "Contact Status", "Priority"]
    );
  });
});
