import { describe, it, expect } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { isOptimalReference } from "../../src/decode.js";
import { normalize, type Problem } from "../../src/problem.js";
import { compareWithReference, solveReference } from "../../src/reference.js";
import { createServer, SOLVE_TOOL_NAME } from "../../src/server.js";
import { applicableMethods, solve } from "../../src/solve.js";

const bounded: Record<string, Problem> = {
  production: normalize("maximize", [3, 2], [
    { coefficients: [2, 1], relation: "<=", rhs: 100 },
    { coefficients: [1, 2], relation: "<=", rhs: 80 },
  ]),
  diet: normalize("minimize", [2, 3], [
    { coefficients: [1, 2], relation: ">=", rhs: 8 },
    { coefficients: [3, 1], relation: ">=", rhs: 12 },
  ]),
  equality: normalize("maximize", [1, 2], [
    { coefficients: [1, 1], relation: "=", rhs: 4 },
    { coefficients: [0, 1], relation: "<=", rhs: 3 },
  ]),
  threeVariables: normalize("maximize", [2, 3, 1], [
    { coefficients: [1, 1, 1], relation: "<=", rhs: 40 },
    { coefficients: [2, 1, -1], relation: ">=", rhs: 10 },
    { coefficients: [0, -1, 1], relation: ">=", rhs: -10 },
  ]),
  freeVariable: normalize(
    "minimize",
    [1, 1],
    [
      { coefficients: [1, 0], relation: ">=", rhs: -3 },
      { coefficients: [0, 1], relation: ">=", rhs: 2 },
    ],
    false,
  ),
  smallCoefficient: normalize("minimize", [1, 1], [
    { coefficients: [0.00001, 0], relation: ">=", rhs: 1 },
  ]),
};

const infeasible: Record<string, Problem> = {
  contradictoryRows: normalize("minimize", [1, 1], [
    { coefficients: [1, 1], relation: ">=", rhs: 10 },
    { coefficients: [1, 1], relation: "<=", rhs: 5 },
  ]),
  improvingColumnOutsideConflict: normalize("maximize", [1, 0], [
    { coefficients: [0, 1], relation: ">=", rhs: 5 },
    { coefficients: [0, 1], relation: "<=", rhs: 3 },
  ]),
};

describe("agreement with HiGHS", () => {
  for (const [name, problem] of Object.entries(bounded)) {
    it(`should match the HiGHS optimum for ${name} with every applicable method`, async () => {
      const reference = await solveReference(problem);
      expect(isOptimalReference(reference)).toBe(true);

      for (const method of applicableMethods(problem)) {
        const result = solve(problem, method);
        expect(compareWithReference(result, reference)).toMatchObject({ agrees: true });
      }
    });
  }

  for (const [name, problem] of Object.entries(infeasible)) {
    it(`should agree with HiGHS that ${name} is infeasible with every applicable method`, async () => {
      const reference = await solveReference(problem);
      expect(reference.status.split("_")).toContain("infeasible");

      for (const method of applicableMethods(problem)) {
        const result = solve(problem, method);
        expect(result.status).toBe("infeasible");
        expect(compareWithReference(result, reference)).toEqual({ agrees: true });
      }
    });
  }

  it("should report the HiGHS objective value", async () => {
    const reference = await solveReference(bounded.production);

    expect(reference).toMatchObject({ status: "optimal", variables: { x1: 40, x2: 20 } });
    if (isOptimalReference(reference)) {
      expect(reference.objectiveValue).toBeCloseTo(160, 6);
    }
  });

  it("should attach the cross-check to a tool result", async () => {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const server = createServer();
    const client = new Client({ name: "test-client", version: "1.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

    try {
      const result = CallToolResultSchema.parse(
        await client.callTool({
          name: SOLVE_TOOL_NAME,
          arguments: {
            problem: {
              direction: "minimize",
              objective: [2, 3],
              constraints: [
                { coefficients: [1, 2], relation: ">=", rhs: 8 },
                { coefficients: [3, 1], relation: ">=", rhs: 12 },
              ],
            },
            crossCheck: true,
          },
        }),
      );
      const [item] = result.content;
      if (!item || item.type !== "text") {
        throw new Error("Expected a text result");
      }

      expect(JSON.parse(item.text)).toMatchObject({
        method: "big-m",
        reference: { status: "optimal", agrees: true },
      });
    } finally {
      await client.close();
      await server.close();
    }
  });
});
