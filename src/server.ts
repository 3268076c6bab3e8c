import { readFileSync } from "node:fs";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { encode } from "./encode.js";
import { ValidationError } from "./errors.js";
import { parseProblem } from "./problem.js";
import { compareWithReference, solveReference } from "./reference.js";
import { SolveArgsSchema, ValidateArgsSchema } from "./schemas.js";
import { applicableMethods, recommendMethod, solve } from "./solve.js";

export const SOLVE_TOOL_NAME = "solve-lp-stepwise";
export const VALIDATE_TOOL_NAME = "validate-lp-problem";

const PackageJsonSchema = z.object({ version: z.string() });

// Resolves to the package root from both src/ and dist/
export const version = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8")),
).version;

function toolResult(value: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

function toolInputSchema(schema: z.ZodTypeAny) {
  return {
    ...zodToJsonSchema(schema, {
      $refStrategy: "none",
    }),
    type: "object" as const,
  };
}

async function solveStepwise(args: unknown) {
  const validationResult = SolveArgsSchema.safeParse(args);
  if (!validationResult.success) {
    throw ValidationError.fromZod(validationResult.error);
  }

  const { method, options, crossCheck } = validationResult.data;
  const problem = parseProblem(validationResult.data.problem);
  const result = solve(problem, method ?? recommendMethod(problem), options);

  const output: Record<string, unknown> = {
    method: result.method,
    formulation: encode(problem),
    result,
  };

  if (crossCheck) {
    const reference = await solveReference(problem);
    output.reference = { ...reference, ...compareWithReference(result, reference) };
  }

  return toolResult(output);
}

// An invalid problem is an answer here, not a failed call.
function validateProblem(args: unknown) {
  const validationResult = ValidateArgsSchema.safeParse(args);

  if (!validationResult.success) {
    return toolResult({
      valid: false,
      errors: ValidationError.fromZod(validationResult.error).reasons,
    });
  }

  const problem = parseProblem(validationResult.data.problem);
  return toolResult({
    valid: true,
    variables: problem.variableNames,
    constraints: problem.constraints.length,
    applicableMethods: applicableMethods(problem),
    recommendedMethod: recommendMethod(problem),
  });
}

/**
 * Creates the MCP server exposing the stepwise solver. The caller connects it to a transport.
 */
export function createServer(): Server {
  const server = new Server(
    {
      name: "lp-steps",
      version,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: SOLVE_TOOL_NAME,
        description:
          "Solve a linear programming (LP) problem with the simplex, Big-M or graphical method and return every intermediate step with an explanation",
        inputSchema: toolInputSchema(SolveArgsSchema),
      },
      {
        name: VALIDATE_TOOL_NAME,
        description:
          "Check a linear programming (LP) problem and report which solution methods apply to it",
        inputSchema: toolInputSchema(ValidateArgsSchema),
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    if (name !== SOLVE_TOOL_NAME && name !== VALIDATE_TOOL_NAME) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    try {
      return name === SOLVE_TOOL_NAME ? await solveStepwise(args) : validateProblem(args);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new McpError(ErrorCode.InvalidParams, `Invalid parameters: ${error.message}`, {
          errors: error.reasons,
        });
      }
      throw new McpError(ErrorCode.InternalError, `Failed to solve linear program: ${error}`);
    }
  });

  return server;
}
