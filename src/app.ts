import cors from "cors";
import express from "express";
import type { ErrorRequestHandler, Express } from "express";
import { ZodError } from "zod";
import type { AppConfig } from "./config";
import { createHierarchyRouter } from "./routes/hierarchy";
import { createModelsRouter } from "./routes/models";
import { Catalog } from "./services/catalog";
import { createEmbedder } from "./services/embeddings";
import type { Embedder } from "./services/embeddings";
import { CoreError, statusForKind } from "./services/errors";
import { Hierarchy } from "./services/hierarchy";
import { ModelRegistry } from "./services/modelRegistry";
import { TypeMaterializer } from "./services/typeMaterializer";

export type AppDeps = {
  catalog: Catalog;
  embedder: Embedder;
};

export function createDeps(config: AppConfig): AppDeps {
  const hierarchy = new Hierarchy({ file: config.hierarchyFile });
  if (config.seedDefaultHierarchy) hierarchy.ensure("root", "default", "main");
  return {
    catalog: new Catalog(hierarchy, new ModelRegistry(new TypeMaterializer())),
    embedder: createEmbedder({
      apiKey: config.googleApiKey,
      model: config.embeddingModel,
      fallbackDim: config.embeddingDim,
    }),
  };
}

function isBodyParseError(err: unknown): err is SyntaxError & { status: number } {
  return err instanceof SyntaxError && "status" in err && err.status === 400;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (err instanceof CoreError) {
    res.status(statusForKind(err.kind)).json({ ok: false, kind: err.kind, error: err.message });
    return;
  }
  if (err instanceof ZodError) {
    const error = err.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
    res.status(400).json({ ok: false, kind: "InvalidRequest", error });
    return;
  }
  if (isBodyParseError(err)) {
    res.status(400).json({ ok: false, kind: "InvalidRequest", error: "Request body is not valid JSON" });
    return;
  }
  console.error(err);
  res.status(500).json({ ok: false, kind: "Internal", error: err instanceof Error ? err.message : "Request failed" });
};

export function createApp(deps: AppDeps, config: Pick<AppConfig, "bodyLimit" | "maxTopK">): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: config.bodyLimit }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      models: deps.catalog.registry.size,
    });
  });

  app.use(createHierarchyRouter(deps.catalog));
  app.use(createModelsRouter(deps.catalog, { embedder: deps.embedder, maxTopK: config.maxTopK }));
  app.use(errorHandler);
  return app;
}
