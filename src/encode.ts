import type { Direction, Problem } from "./problem.js";

/**
 * Encodes a problem into CPLEX LP format, the text HiGHS reads and a compact formulation for
 * people to read.
 *
 * The LP format consists of several sections:
 * - Objective: The function to minimize or maximize
 * - Subject To: The constraints
 * - Bounds: Sign restrictions of the variables
 *
 * @param problem - The validated problem
 * @returns The problem encoded in CPLEX LP format
 */
export function encode(problem: Problem): string {
  let lpString = "";

  lpString += formatObjective(problem.direction, problem.objective, problem.variableNames);
  lpString += formatConstraints(problem);
  lpString += formatBounds(problem);

  lpString += "End\n";

  return lpString;
}

/**
 * Formats a coefficient for display in LP format.
 * Handles special cases like coefficients of 1, -1, and proper sign formatting.
 *
 * @param coeff - The coefficient value
 * @param varName - The variable name
 * @param isFirst - Whether this is the first term (affects sign handling)
 * @returns The formatted term string
 */
function formatCoefficient(coeff: number, varName: string, isFirst: boolean = false): string {
  if (coeff === 0) return "";

  if (coeff === 1) {
    return isFirst ? varName : `+ ${varName}`;
  } else if (coeff === -1) {
    return `- ${varName}`;
  } else if (coeff > 0) {
    return isFirst ? `${formatValue(coeff)} ${varName}` : `+ ${formatValue(coeff)} ${varName}`;
  } else {
    return `- ${formatValue(Math.abs(coeff))} ${varName}`;
  }
}

/**
 * Writes a number in plain decimal notation. `String()` switches to exponents below 1e-6 and
 * from 1e21 on; the digits are shifted by hand so no precision is lost.
 */
export function formatValue(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, sign, lead, fraction = "", exponentText] = match;
  const digits = lead + fraction;
  const exponent = Number(exponentText);

  if (exponent < 0) {
    return `${sign}0.${"0".repeat(-exponent - 1)}${digits}`;
  }
  return `${sign}${digits}${"0".repeat(exponent - fraction.length)}`;
}

// LP format has no empty expressions, so a row of zeros is written as `0 <first variable>`.
function formatExpression(coefficients: readonly number[], names: readonly string[]): string {
  const terms: string[] = [];

  coefficients.forEach((coeff, i) => {
    const term = formatCoefficient(coeff, names[i], terms.length === 0);
    if (term) terms.push(term);
  });

  return terms.length > 0 ? terms.join(" ") : `0 ${names[0]}`;
}

function formatObjective(
  direction: Direction,
  objective: readonly number[],
  names: readonly string[],
): string {
  let result = direction === "minimize" ? "Minimize\n" : "Maximize\n";
  result += ` obj: ${formatExpression(objective, names)}\n`;
  return result;
}

function formatConstraints(problem: Problem): string {
  let result = "Subject To\n";

  problem.constraints.forEach((constraint, i) => {
    const expression = formatExpression(constraint.coefficients, problem.variableNames);
    result += ` c${i + 1}: ${expression} ${constraint.relation} ${formatValue(constraint.rhs)}\n`;
  });

  return result;
}

/**
 * Formats the bounds section: `0 <= x <= +inf` for sign-restricted variables, `x free`
 * otherwise.
 */
function formatBounds(problem: Problem): string {
  let result = "Bounds\n";

  for (const varName of problem.variableNames) {
    result += problem.nonNegative ? ` 0 <= ${varName} <= +inf\n` : ` ${varName} free\n`;
  }

  return result;
}
