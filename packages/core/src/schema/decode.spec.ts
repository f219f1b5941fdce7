import { SchemaDecodeError, isSchemaDecodeError } from "sdui-shared";
import { decodeScreen, encodeScreen, parseScreen } from "./decode";

function decodeError(input: Uint8Array | string): SchemaDecodeError {
  try {
    decodeScreen(input);
  } catch (error) {
    if (isSchemaDecodeError(error)) return error;
    throw error;
  }
  throw new Error("expected decodeScreen to throw");
}

describe("decodeScreen", () => {
  it("should decode a minimal screen", () => {
    const screen = decodeScreen(
      '{"version":1,"component":{"id":"root","type":"vstack","children":[{"id":"t1","type":"text","text":"Hello"}]}}',
    );

    expect(screen.version).toBe(1);
    expect(screen.component).toEqual({
      id: "root",
      type: "vstack",
      extras: {},
      children: [{ id: "t1", type: "text", text: "Hello", extras: {} }],
    });
  });

  it("should accept UTF-8 bytes", () => {
    const bytes = new TextEncoder().encode(
      '{"version":2,"component":{"id":"t","type":"text","text":"Grüße"}}',
    );

    expect(decodeScreen(bytes).component.text).toBe("Grüße");
  });

  it("should decode the item view of a list", () => {
    const screen = decodeScreen(
      JSON.stringify({
        version: 1,
        component: {
          id: "jobs",
          type: "list",
          itemView: { id: "row", type: "text", key: "customerName" },
        },
      }),
    );

    expect(screen.component.itemView).toEqual({
      id: "row",
      type: "text",
      key: "customerName",
      extras: {},
    });
  });

  it("should derive ids from position when absent", () => {
    const screen = decodeScreen(
      '{"version":1,"component":{"type":"vstack","children":[{"type":"text","text":"a"}]}}',
    );

    expect(screen.component.id).toBe("auto:component");
    expect(screen.component.children?.[0]?.id).toBe("auto:component.children[0]");
  });

  it("should produce identical trees for identical input", () => {
    const json = '{"version":1,"component":{"type":"hstack","children":[{"type":"spacer"}]}}';

    expect(decodeScreen(json)).toEqual(decodeScreen(json));
  });

  it("should keep unrecognised attributes as extras", () => {
    const screen = decodeScreen(
      '{"version":3,"component":{"id":"w","type":"weatherDashboard","city":"Oslo","units":{"temp":"C"}}}',
    );

    expect(screen.component.extras).toEqual({ city: "Oslo", units: { temp: "C" } });
    expect(screen.component).not.toHaveProperty("city");
  });

  it("should decode structured attributes", () => {
    const screen = decodeScreen(
      JSON.stringify({
        version: 3,
        component: {
          id: "p",
          type: "picker",
          valueKey: "priority",
          selectionMode: "multiple",
          options: [{ id: "h", text: "High", value: "high" }],
          shadowOffset: { x: 1, y: 3 },
          animation: { type: "spring", duration: 0.5 },
        },
      }),
    );

    expect(screen.component.options).toEqual([{ id: "h", text: "High", value: "high" }]);
    expect(screen.component.selectionMode).toBe("multiple");
    expect(screen.component.shadowOffset).toEqual({ x: 1, y: 3 });
    expect(screen.component.animation).toEqual({ type: "spring", duration: 0.5 });
  });

  describe("failures", () => {
    it("should reject malformed JSON", () => {
      const error = decodeError('{"version":1,');

      expect(error.code).toBe("DECODE_JSON");
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]?.path).toBe("");
    });

    it("should reject bytes that are not UTF-8", () => {
      const error = decodeError(new Uint8Array([0x7b, 0xff, 0x7d]));

      expect(error.code).toBe("DECODE_JSON");
    });

    it("should reject an unknown type tag with its path", () => {
      const error = decodeError(
        '{"version":1,"component":{"id":"root","type":"vstack","children":[{"id":"c","type":"carousel"}]}}',
      );

      expect(error.code).toBe("DECODE_SCHEMA");
      expect(error.issues).toEqual([
        { path: "component.children[0].type", message: "Unknown component type 'carousel'" },
      ]);
      expect(error.message).toBe(
        "Screen document does not match the schema: component.children[0].type: Unknown component type 'carousel'",
      );
    });

    it("should reject a node without a type", () => {
      const error = decodeError('{"version":1,"component":{"id":"root"}}');

      expect(error.issues.map((issue) => issue.path)).toEqual(["component.type"]);
    });

    it("should reject a wrongly typed attribute", () => {
      const error = decodeError(
        '{"version":1,"component":{"id":"root","type":"vstack","spacing":"8"}}',
      );

      expect(error.issues.map((issue) => issue.path)).toEqual(["component.spacing"]);
    });

    it("should report every issue, not only the first", () => {
      const error = decodeError(
        '{"version":1,"component":{"id":"root","type":"vstack","children":[{"type":"nope"},{"type":"gone"}]}}',
      );

      expect(error.issues.map((issue) => issue.path)).toEqual([
        "component.children[0].type",
        "component.children[1].type",
      ]);
      expect(error.message).toContain("(+1 more)");
    });

    it("should reject a missing version", () => {
      const error = decodeError('{"component":{"id":"t","type":"spacer"}}');

      expect(error.issues.map((issue) => issue.path)).toEqual(["version"]);
    });
  });
});

describe("parseScreen", () => {
  it("should validate an already-parsed value", () => {
    const screen = parseScreen({ version: 1, component: { id: "d", type: "divider" } });

    expect(screen.component).toEqual({ id: "d", type: "divider", extras: {} });
  });

  it("should throw SchemaDecodeError for non-objects", () => {
    expect(() => parseScreen("screen")).toThrow(SchemaDecodeError);
  });
});

describe("encodeScreen", () => {
  it("should restore extras as top-level attributes", () => {
    const screen = decodeScreen(
      '{"version":3,"component":{"id":"w","type":"weatherDashboard","city":"Oslo"}}',
    );

    expect(JSON.parse(encodeScreen(screen))).toEqual({
      version: 3,
      component: { id: "w", type: "weatherDashboard", city: "Oslo" },
    });
  });

  it("should decode back to an equal screen", () => {
    const screen = decodeScreen(
      JSON.stringify({
        version: 2,
        component: {
          id: "root",
          type: "list",
          padding: 8,
          itemView: {
            id: "row",
            type: "hstack",
            children: [{ id: "name", type: "text", key: "customerName", badge: "new" }],
          },
        },
      }),
    );

    expect(decodeScreen(encodeScreen(screen))).toEqual(screen);
  });
});
