/**
 * @fileoverview Tests for the graph assembler.
 *
 * Covers: node creation from structured results, ignored failures, the
 * duplicate-node invariant, edge recording and finalization.
 */

import { describe, it, expect } from "vitest";
import type { PageResult, PageSuccess } from "../../src/crawler/types.js";
import { GraphAssembler, countNodes, emptyGraph } from "../../src/graph/assembler.js";
import { GraphAssemblyError } from "../../src/utils/errors.js";

const BASE = "https://ex.org/docs";

function structured(url: string, overrides: Partial<PageSuccess> = {}): PageSuccess {
  return {
    succeeded: true,
    url,
    title: "Router",
    body: {
      kind: "structured",
      fields: {
        concepts: ["Routes", "Guards", "Routes"],
        apiSurface: [{ name: "createRouter()", description: "Creates a router." }],
        codeSamples: ["createRouter({ routes })"],
      },
    },
    outboundLinks: [],
    metadata: {
      finalUrl: url,
      statusCode: 200,
      contentType: "text/html",
      fetchedAt: 0,
      fromCache: false,
    },
    ...overrides,
  };
}

const failure: PageResult = {
  succeeded: false,
  url: `${BASE}/api/broken`,
  error: "HTTP 500",
  code: "FETCH_FAILED",
  stage: "fetch",
};

describe("GraphAssembler.recordNode", () => {
  it("builds a node from a structured result", () => {
    const assembler = new GraphAssembler("widgetry", BASE);

    const node = assembler.recordNode(`${BASE}/api/router`, 1, structured(`${BASE}/api/router`));

    expect(node).toEqual({
      url: `${BASE}/api/router`,
      title: "Router",
      concepts: ["Routes", "Guards"],
      api_surface: [{ name: "createRouter()", description: "Creates a router." }],
      code_samples: ["createRouter({ routes })"],
      depth: 1,
    });
    expect(assembler.nodeCount).toBe(1);
  });

  it("gives a non-structured success empty lists", () => {
    const assembler = new GraphAssembler("widgetry", BASE);
    const page = structured(BASE, { body: { kind: "document", text: "# Home" } });

    expect(assembler.recordNode(BASE, 0, page)).toMatchObject({
      concepts: [],
      api_surface: [],
      code_samples: [],
    });
  });

  it("ignores failed results", () => {
    const assembler = new GraphAssembler("widgetry", BASE);

    expect(assembler.recordNode(failure.url, 1, failure)).toBeUndefined();
    expect(assembler.nodeCount).toBe(0);
  });

  it("refuses a second node for the same URL", () => {
    const assembler = new GraphAssembler("widgetry", BASE);
    assembler.recordNode(BASE, 0, structured(BASE));

    expect(() => assembler.recordNode(BASE, 1, structured(BASE))).toThrow(GraphAssemblyError);
  });

  it("copies fields so later changes to the result do not leak in", () => {
    const assembler = new GraphAssembler("widgetry", BASE);
    const page = structured(BASE);
    assembler.recordNode(BASE, 0, page);

    if (page.body.kind === "structured") {
      page.body.fields.apiSurface[0].name = "changed";
      page.body.fields.codeSamples.push("extra");
    }
    const graph = assembler.finalize();

    expect(graph.nodes[BASE].api_surface[0].name).toBe("createRouter()");
    expect(graph.nodes[BASE].code_samples).toEqual(["createRouter({ routes })"]);
  });
});

describe("GraphAssembler.recordEdge and finalize", () => {
  it("keeps every edge in insertion order, duplicates included", () => {
    const assembler = new GraphAssembler("widgetry", BASE);
    assembler.recordEdge(BASE, `${BASE}/api/a`);
    assembler.recordEdge(BASE, `${BASE}/api/a`);
    assembler.recordEdge(`${BASE}/api/a`, BASE);

    expect(assembler.edgeCount).toBe(3);
    expect(assembler.finalize().relationships).toEqual([
      { from: BASE, to: `${BASE}/api/a`, type: "references" },
      { from: BASE, to: `${BASE}/api/a`, type: "references" },
      { from: `${BASE}/api/a`, to: BASE, type: "references" },
    ]);
  });

  it("returns a deep-frozen graph", () => {
    const assembler = new GraphAssembler("widgetry", BASE);
    assembler.recordNode(BASE, 0, structured(BASE));
    assembler.recordEdge(BASE, `${BASE}/api/a`);

    const graph = assembler.finalize();

    expect(graph.framework).toBe("widgetry");
    expect(graph.base_url).toBe(BASE);
    expect(Object.isFrozen(graph)).toBe(true);
    expect(Object.isFrozen(graph.nodes)).toBe(true);
    expect(Object.isFrozen(graph.nodes[BASE])).toBe(true);
    expect(Object.isFrozen(graph.nodes[BASE].concepts)).toBe(true);
    expect(Object.isFrozen(graph.relationships)).toBe(true);
    expect(Object.isFrozen(graph.relationships[0])).toBe(true);
  });

  it("rejects every call after finalize", () => {
    const assembler = new GraphAssembler("widgetry", BASE);
    assembler.finalize();

    expect(() => assembler.recordNode(BASE, 0, structured(BASE))).toThrow(GraphAssemblyError);
    expect(() => assembler.recordEdge(BASE, BASE)).toThrow("recordEdge called after finalize()");
    expect(() => assembler.finalize()).toThrow(GraphAssemblyError);
  });
});

describe("emptyGraph and countNodes", () => {
  it("describes a graph with nothing in it", () => {
    const graph = emptyGraph("widgetry");

    expect(graph).toEqual({ framework: "widgetry", base_url: "", nodes: {}, relationships: [] });
    expect(countNodes(graph)).toBe(0);
  });
});
