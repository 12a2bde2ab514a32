import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";

import { isEigenSolver } from "../config/pcaConfig";
import { isClientError } from "../errors";
import { Matrix } from "../matrix";
import { fit, transform, type EigenSolver } from "../pca";
import { parseNumericRows, type ValidationErrorBody } from "./vector-validation";

const MAX_VECTORS = 10_000;
const JSON_BODY_LIMIT = "1mb";
const DEFAULT_COMPONENTS = 2;

type PcaResponseBody = {
  points: number[][];
  components: number;
  mean: number[];
  eigenvalues: number[];
  explainedVarianceRatio: number;
};

type ErrorResponseBody = {
  error: string;
  details?: string;
};

type HealthResponseBody = {
  status: "ok";
};

type ParsedPcaRequest = {
  vectors: number[][];
  components: number;
  solver: EigenSolver;
};

type RawPcaRequest = {
  vectors?: unknown;
  components?: unknown;
  solver?: unknown;
};

export function parsePcaRequest(
  body: unknown,
): ParsedPcaRequest | ValidationErrorBody {
  if (body === null || typeof body !== "object") {
    return {
      error:
        "Invalid request body: expected a JSON object with 'vectors', and optional 'components' and 'solver' fields.",
    };
  }

  const { vectors, components, solver } = body as RawPcaRequest;

  const parsedRows = parseNumericRows("vectors", vectors);

  if ("error" in parsedRows) {
    return parsedRows;
  }

  if (parsedRows.rows.length > MAX_VECTORS) {
    return {
      error: `Invalid request body: 'vectors' must not contain more than ${MAX_VECTORS} items.`,
    };
  }

  let componentsValue = DEFAULT_COMPONENTS;

  if (components !== undefined) {
    if (
      typeof components !== "number" ||
      !Number.isInteger(components) ||
      components <= 0
    ) {
      return {
        error:
          "Invalid request body: 'components' must be a positive integer if provided.",
      };
    }

    componentsValue = components;
  }

  if (componentsValue > parsedRows.dimension) {
    return {
      error: `Invalid request body: 'components' (${componentsValue}) cannot be greater than the input vector dimension (${parsedRows.dimension}).`,
    };
  }

  let solverValue: EigenSolver = "power-iteration";

  if (solver !== undefined) {
    if (!isEigenSolver(solver)) {
      return {
        error:
          "Invalid request body: 'solver' must be either 'power-iteration' or 'symmetric-evd' if provided.",
      };
    }

    solverValue = solver;
  }

  return {
    vectors: parsedRows.rows,
    components: componentsValue,
    solver: solverValue,
  };
}

function sendJson(res: Response, status: number, body: unknown) {
  res.status(status);
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.json(body);
}

export function handlePca(req: Request, res: Response) {
  const parsed = parsePcaRequest(req.body);

  if ("error" in parsed) {
    sendJson(res, 400, parsed);
    return;
  }

  const { vectors, components, solver } = parsed;

  try {
    // fit() centres its input in place, so transform gets its own copy.
    const model = fit(Matrix.fromArray(vectors), components, { solver });
    const points = transform(model, Matrix.fromArray(vectors));

    const responseBody: PcaResponseBody = {
      points: points.toArray(),
      components: model.nComponents,
      mean: model.mean,
      eigenvalues: model.eigenvalues,
      explainedVarianceRatio: model.explainedVarianceRatio,
    };

    sendJson(res, 200, responseBody);
  } catch (error) {
    const message =
      error instanceof Error
        ? error.message
        : "Unexpected error while computing PCA.";

    sendJson(res, isClientError(error) ? 400 : 500, {
      error: "Failed to compute PCA.",
      details: message,
    } satisfies ErrorResponseBody);
  }
}

export function handleHealth(_req: Request, res: Response) {
  const body: HealthResponseBody = { status: "ok" };

  sendJson(res, 200, body);
}

function isPayloadTooLarge(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "entity.too.large"
  );
}

/** Maps body-parser failures to 4xx responses; anything else goes on. */
export function handleBodyParseError(
  error: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
) {
  if (isPayloadTooLarge(error)) {
    sendJson(res, 413, {
      error: `Request body exceeds the ${JSON_BODY_LIMIT} limit.`,
    } satisfies ErrorResponseBody);
    return;
  }

  if (error instanceof SyntaxError) {
    sendJson(res, 400, {
      error: "Invalid JSON body.",
      details: error.message,
    } satisfies ErrorResponseBody);
    return;
  }

  next(error);
}

export function createApp(): Express {
  const app = express();

  app.use(express.json({ limit: JSON_BODY_LIMIT }));
  app.use(handleBodyParseError);

  app.post("/api/pca", (req, res) => {
    handlePca(req, res);
  });

  app.all("/api/pca", (_req, res) => {
    res.setHeader("Allow", "POST");
    res.status(405).send("Method Not Allowed");
  });

  app.get("/api/health", (req, res) => {
    handleHealth(req, res);
  });

  app.all("/api/health", (_req, res) => {
    res.setHeader("Allow", "GET");
    res.status(405).send("Method Not Allowed");
  });

  app.use((_req, res) => {
    res.status(404).send("Not Found");
  });

  app.use(
    (
      error: unknown,
      _req: Request,
      res: Response,
      _next: NextFunction,
    ) => {
      console.error("Unhandled error in PCA server", error);

      sendJson(res, 500, {
        error: "Internal server error.",
        details: error instanceof Error ? error.message : String(error),
      } satisfies ErrorResponseBody);
    },
  );

  return app;
}
