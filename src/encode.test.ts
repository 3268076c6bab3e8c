import { describe, it, expect } from "vitest";
import { encode, formatValue } from "./encode.js";
import { normalize } from "./problem.js";

describe("encode", () => {
  it("should encode a maximization problem with sign-restricted variables", () => {
    const problem = normalize("maximize", [3, 2], [
      { coefficients: [2, 1], relation: "<=", rhs: 100 },
      { coefficients: [1, 2], relation: "<=", rhs: 80 },
    ]);

    expect(encode(problem)).toBe(
      [
        "Maximize",
        " obj: 3 x1 + 2 x2",
        "Subject To",
        " c1: 2 x1 + x2 <= 100",
        " c2: x1 + 2 x2 <= 80",
        "Bounds",
        " 0 <= x1 <= +inf",
        " 0 <= x2 <= +inf",
        "End",
        "",
      ].join("\n"),
    );
  });

  it("should encode a minimization problem with mixed relations and custom names", () => {
    const problem = normalize(
      "minimize",
      [2, 3],
      [
        { coefficients: [1, 2], relation: ">=", rhs: 8 },
        { coefficients: [3, 1], relation: "≥", rhs: 12 },
        { coefficients: [1, -1], relation: "=", rhs: 1 },
      ],
      true,
      ["hours", "units"],
    );

    const result = encode(problem);

    expect(result).toContain("Minimize\n obj: 2 hours + 3 units\n");
    expect(result).toContain(" c1: hours + 2 units >= 8\n");
    expect(result).toContain(" c2: 3 hours + units >= 12\n");
    expect(result).toContain(" c3: hours - units = 1\n");
  });

  it("should handle negative, fractional and zero coefficients", () => {
    const problem = normalize("maximize", [-1, 0, 2.5], [
      { coefficients: [0, -3, 1], relation: "<=", rhs: -4 },
    ]);

    const result = encode(problem);

    expect(result).toContain(" obj: - x1 + 2.5 x3\n");
    expect(result).toContain(" c1: - 3 x2 + x3 <= -4\n");
  });

  it("should write a zero term for an all-zero row", () => {
    const problem = normalize("maximize", [1, 1], [
      { coefficients: [0, 0], relation: "<=", rhs: 5 },
      { coefficients: [1, 1], relation: "<=", rhs: 5 },
    ]);

    expect(encode(problem)).toContain(" c1: 0 x1 <= 5\n");
  });

  it("should write very small and very large numbers without exponents", () => {
    const problem = normalize("maximize", [1, 1], [
      { coefficients: [1e-7, -2.5e-8], relation: "<=", rhs: 1e21 },
      { coefficients: [1, 1], relation: ">=", rhs: -1.5e-7 },
    ]);

    const result = encode(problem);

    expect(result).toContain(" c1: 0.0000001 x1 - 0.000000025 x2 <= 1000000000000000000000\n");
    expect(result).toContain(" c2: x1 + x2 >= -0.00000015\n");
  });

  it("should declare unrestricted variables as free", () => {
    const problem = normalize(
      "minimize",
      [1, 1],
      [{ coefficients: [1, 1], relation: ">=", rhs: 2 }],
      false,
    );

    const result = encode(problem);

    expect(result).toContain("Bounds\n x1 free\n x2 free\nEnd\n");
    expect(result).not.toContain("+inf");
  });
});

describe("formatValue", () => {
  it("should leave ordinary numbers as String() writes them", () => {
    expect(formatValue(0)).toBe("0");
    expect(formatValue(-4)).toBe("-4");
    expect(formatValue(0.1)).toBe("0.1");
    expect(formatValue(123456.789)).toBe("123456.789");
  });

  it("should expand exponent notation", () => {
    expect(formatValue(1e-7)).toBe("0.0000001");
    expect(formatValue(-1.25e-9)).toBe("-0.00000000125");
    expect(formatValue(1e21)).toBe("1000000000000000000000");
    expect(formatValue(1.5e22)).toBe("15000000000000000000000");
  });
});
