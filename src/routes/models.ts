import { Router } from "express";
import { z } from "zod";
import type { Catalog } from "../services/catalog";
import type { Embedder } from "../services/embeddings";
import { CoreError } from "../services/errors";
import { formatModelKey } from "../services/modelRegistry";
import type { ModelEntry } from "../services/modelRegistry";
import { isVector, serializeRecord } from "../services/record";
import type { ModelKey, TypeDescriptor } from "../types";
import { Name } from "./hierarchy";

const RepositoryParams = z.object({ namespace: Name, workspace: Name, repository: Name });
const ModelParams = RepositoryParams.extend({ model: Name });
const DataParams = ModelParams.extend({ id: z.string().min(1) });

const RecordInput = z.record(z.string(), z.unknown());

const DefineModelSchema = z.object({
  json_schema: z.union([z.string().min(1), RecordInput]),
  base_class: z.string().min(1),
});

// `data` may arrive as an already encoded JSON string.
const IndexSchema = z.object({
  data: z.preprocess(
    (v) => {
      if (typeof v !== "string") return v;
      try {
        return JSON.parse(v);
      } catch {
        return v;
      }
    },
    z.union([RecordInput, z.array(RecordInput).min(1)]),
  ),
});

function searchSchema(maxTopK: number) {
  return z
    .object({
      query: z.union([z.string().min(1), RecordInput]),
      field: z.string().min(1).optional(),
      limit: z.number().int().min(1).max(maxTopK).optional(),
      top_k: z.number().int().min(1).max(maxTopK).optional(),
    })
    .transform(({ limit, top_k, ...rest }) => ({ ...rest, limit: limit ?? top_k ?? 10 }));
}

function summarize(entry: ModelEntry, count: number) {
  const { descriptor, index } = entry;
  const vectorField = index.vectorField;
  return {
    ...entry.key,
    title: descriptor.title,
    baseShape: descriptor.baseShape,
    fingerprint: descriptor.fingerprint,
    fields: descriptor.fields,
    vectorField: vectorField ?? null,
    dimension: vectorField !== undefined ? (index.dimensionOf(vectorField) ?? null) : null,
    count,
    createdAt: entry.createdAt,
  };
}

export type ModelsRouterOptions = {
  embedder: Embedder;
  maxTopK: number;
};

export function createModelsRouter(catalog: Catalog, opts: ModelsRouterOptions): Router {
  const router = Router();
  const SearchSchema = searchSchema(opts.maxTopK);
  const base = "/namespaces/:namespace/workspaces/:workspace/repositories/:repository/models";

  // Text documents sent without a vector get one from the embedder.
  async function withEmbeddings(descriptor: TypeDescriptor, inputs: Record<string, unknown>[]) {
    const textField = descriptor.primaryTextField;
    const vectorField = descriptor.primaryVectorField;
    if (textField === undefined || vectorField === undefined) return inputs;

    const pending = inputs
      .map((input, i) => ({ i, text: input[textField] }))
      .filter((p): p is { i: number; text: string } => {
        const input = inputs[p.i];
        return typeof p.text === "string" && p.text.length > 0 && !isVector(input[vectorField]);
      });
    if (pending.length === 0) return inputs;

    const vectors = await opts.embedder.embedMany(pending.map((p) => p.text));
    const out = inputs.slice();
    pending.forEach((p, n) => {
      out[p.i] = { ...inputs[p.i], [vectorField]: vectors[n] };
    });
    return out;
  }

  router.get(base, (req, res, next) => {
    try {
      const { namespace, workspace, repository } = RepositoryParams.parse(req.params);
      const models = catalog.listModels(namespace, workspace, repository).map((e) => e.key.model);
      res.json({ ok: true, models });
    } catch (err) {
      next(err);
    }
  });

  router.post(`${base}/:model`, async (req, res, next) => {
    try {
      const key: ModelKey = ModelParams.parse(req.params);
      const { json_schema, base_class } = DefineModelSchema.parse(req.body);
      const existed = catalog.registry.get(key) !== undefined;
      const entry = catalog.defineModel(key, json_schema, base_class);
      if (!existed) console.log(`Defined model ${formatModelKey(entry.key)} (${entry.descriptor.baseShape})`);
      res.status(existed ? 200 : 201).json({ ok: true, model: summarize(entry, await entry.index.count()) });
    } catch (err) {
      next(err);
    }
  });

  router.get(`${base}/:model`, async (req, res, next) => {
    try {
      const entry = catalog.getModel(ModelParams.parse(req.params));
      res.json({ ok: true, model: summarize(entry, await entry.index.count()) });
    } catch (err) {
      next(err);
    }
  });

  router.delete(`${base}/:model`, (req, res, next) => {
    try {
      const key: ModelKey = ModelParams.parse(req.params);
      if (!catalog.deleteModel(key)) throw new CoreError("ModelNotFound", `Model '${key.model}' is not defined`);
      res.json({ ok: true });
    } catch (err) {
      next(err);
    }
  });

  router.post(`${base}/:model/index`, async (req, res, next) => {
    try {
      const key: ModelKey = ModelParams.parse(req.params);
      const { data } = IndexSchema.parse(req.body);
      const { descriptor } = catalog.getModel(key);
      const inputs = await withEmbeddings(descriptor, Array.isArray(data) ? data : [data]);
      const records = await catalog.index(key, inputs);
      res.json({ ok: true, indexed: records.length, ids: records.map((r) => r.id) });
    } catch (err) {
      next(err);
    }
  });

  router.post(`${base}/:model/search`, async (req, res, next) => {
    try {
      const key: ModelKey = ModelParams.parse(req.params);
      const { query, field, limit } = SearchSchema.parse(req.body);
      const { descriptor } = catalog.getModel(key);

      let input: Record<string, unknown>;
      if (typeof query === "string") {
        if (descriptor.primaryTextField === undefined) {
          throw new CoreError("InvalidQuery", `Model '${key.model}' has no text field; send a record query`);
        }
        input = { [descriptor.primaryTextField]: query };
      } else {
        input = query;
      }
      const [embedded] = await withEmbeddings(descriptor, [input]);
      const hits = await catalog.search(key, embedded, field, limit);
      res.json({
        ok: true,
        results: hits.map((h) => ({ record: serializeRecord(h.record), distance: h.distance })),
      });
    } catch (err) {
      next(err);
    }
  });

  router.get(`${base}/:model/data/:id`, async (req, res, next) => {
    try {
      const { id, ...key } = DataParams.parse(req.params);
      const record = await catalog.getRecord(key, id);
      if (!record) throw new CoreError("NotFound", `Record '${id}' does not exist in model '${key.model}'`);
      res.json({ ok: true, record: serializeRecord(record) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
