import { describe, expect, it } from "vitest";
import { indexContract } from "./contract.js";
import { ParseError } from "./errors.js";

const CONTRACT = `
openapi: 3.0.0
info:
  title: Accounts
  version: 1.0.0
components:
  schemas:
    UserSchema:
      type: object
      properties:
        id: { type: integer }
        first_name: { type: string }
        email: { type: string }
    EmptySchema:
      type: object
    ZetaSchema:
      properties:
        zeta: {}
        alpha: {}
    NullSchema:
`;

describe("indexContract", () => {
  it("indexes schema property names in document order", () => {
    const index = indexContract(CONTRACT);
    expect([...index.keys()]).toEqual(["UserSchema", "EmptySchema", "ZetaSchema", "NullSchema"]);
    expect(index.get("UserSchema")).toEqual(["id", "first_name", "email"]);
    expect(index.get("ZetaSchema")).toEqual(["zeta", "alpha"]);
  });

  it("maps schemas without properties to empty lists", () => {
    const index = indexContract(CONTRACT);
    expect(index.get("EmptySchema")).toEqual([]);
    expect(index.get("NullSchema")).toEqual([]);
  });

  it("returns an empty index when there are no schemas", () => {
    expect(indexContract("").size).toBe(0);
    expect(indexContract("openapi: 3.0.0\n").size).toBe(0);
    expect(indexContract("components: {}\n").size).toBe(0);
    expect(indexContract("components:\n  schemas: []\n").size).toBe(0);
  });

  it("reads JSON contracts", () => {
    const json = JSON.stringify({
      components: { schemas: { OrderSchema: { properties: { total: {}, id: {} } } } },
    });
    expect(indexContract(json).get("OrderSchema")).toEqual(["total", "id"]);
  });

  it("resolves aliased schemas", () => {
    const doc = `
components:
  schemas:
    BaseSchema: &base
      properties:
        id: {}
    CopySchema: *base
`;
    expect(indexContract(doc).get("CopySchema")).toEqual(["id"]);
  });

  it("expands merge keys before explicit properties", () => {
    const doc = `
common: &common
  id: {}
  created_at: {}
audit: &audit
  updated_by: {}
components:
  schemas:
    UserSchema:
      properties:
        <<: *common
        name: {}
        id: { type: string }
    OrderSchema:
      properties:
        <<: [*common, *audit]
        total: {}
`;
    const index = indexContract(doc);
    expect(index.get("UserSchema")).toEqual(["id", "created_at", "name"]);
    expect(index.get("OrderSchema")).toEqual(["id", "created_at", "updated_by", "total"]);
  });

  it("expands merge keys on schema entries", () => {
    const doc = `
components:
  schemas:
    BaseSchema: &base
      properties:
        id: {}
    DerivedSchema:
      <<: *base
      type: object
`;
    expect(indexContract(doc).get("DerivedSchema")).toEqual(["id"]);
  });

  it("follows an alias on the components path", () => {
    const doc = `
shared: &c
  schemas:
    UserSchema:
      properties:
        id: {}
        email: {}
components: *c
`;
    expect(indexContract(doc).get("UserSchema")).toEqual(["id", "email"]);
  });

  it("returns frozen property lists", () => {
    expect(Object.isFrozen(indexContract(CONTRACT).get("UserSchema"))).toBe(true);
  });

  it("throws ParseError on malformed YAML", () => {
    const broken = "components: 1\ncomponents: 2\n";
    expect(() => indexContract(broken)).toThrow(ParseError);
    try {
      indexContract(broken, { fileName: "api.yaml" });
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      expect(err.origin).toBe("contract");
      expect(err.fileName).toBe("api.yaml");
    }
  });
});
