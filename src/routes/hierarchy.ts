import { Router } from "express";
import { z } from "zod";
import type { Catalog } from "../services/catalog";

export const Name = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, "Names may only contain letters, digits, '_', '.' and '-'");

const NamespaceParams = z.object({ namespace: Name });
const WorkspaceParams = NamespaceParams.extend({ workspace: Name });
const RepositoryParams = WorkspaceParams.extend({ repository: Name });
const Rename = z.object({ from: Name, to: Name });

export function createHierarchyRouter(catalog: Catalog): Router {
  const router = Router();
  const { hierarchy } = catalog;

  router.get("/namespaces", (_req, res) => {
    res.json({ ok: true, namespaces: hierarchy.listNamespaces() });
  });

  router.post("/namespaces/:namespace", (req, res, next) => {
    try {
      const { namespace } = NamespaceParams.parse(req.params);
      hierarchy.createNamespace(namespace);
      res.status(201).json({ ok: true, namespace });
    } catch (err) {
      next(err);
    }
  });

  router.put("/namespaces/:from/:to", (req, res, next) => {
    try {
      const { from, to } = Rename.parse(req.params);
      catalog.renameNamespace(from, to);
      res.json({ ok: true, namespace: to });
    } catch (err) {
      next(err);
    }
  });

  router.delete("/namespaces/:namespace", (req, res, next) => {
    try {
      const { namespace } = NamespaceParams.parse(req.params);
      catalog.deleteNamespace(namespace);
      res.json({ ok: true });
    } catch (err) {
      next(err);
    }
  });

  router.get("/namespaces/:namespace/workspaces", (req, res, next) => {
    try {
      const { namespace } = NamespaceParams.parse(req.params);
      res.json({ ok: true, workspaces: hierarchy.listWorkspaces(namespace) });
    } catch (err) {
      next(err);
    }
  });

  router.post("/namespaces/:namespace/workspaces/:workspace", (req, res, next) => {
    try {
      const { namespace, workspace } = WorkspaceParams.parse(req.params);
      hierarchy.createWorkspace(namespace, workspace);
      res.status(201).json({ ok: true, workspace });
    } catch (err) {
      next(err);
    }
  });

  router.put("/namespaces/:namespace/workspaces/:from/:to", (req, res, next) => {
    try {
      const { namespace } = NamespaceParams.parse(req.params);
      const { from, to } = Rename.parse(req.params);
      catalog.renameWorkspace(namespace, from, to);
      res.json({ ok: true, workspace: to });
    } catch (err) {
      next(err);
    }
  });

  router.delete("/namespaces/:namespace/workspaces/:workspace", (req, res, next) => {
    try {
      const { namespace, workspace } = WorkspaceParams.parse(req.params);
      catalog.deleteWorkspace(namespace, workspace);
      res.json({ ok: true });
    } catch (err) {
      next(err);
    }
  });

  router.get("/namespaces/:namespace/workspaces/:workspace/repositories", (req, res, next) => {
    try {
      const { namespace, workspace } = WorkspaceParams.parse(req.params);
      res.json({ ok: true, repositories: hierarchy.listRepositories(namespace, workspace) });
    } catch (err) {
      next(err);
    }
  });

  router.post("/namespaces/:namespace/workspaces/:workspace/repositories/:repository", (req, res, next) => {
    try {
      const { namespace, workspace, repository } = RepositoryParams.parse(req.params);
      hierarchy.createRepository(namespace, workspace, repository);
      res.status(201).json({ ok: true, repository });
    } catch (err) {
      next(err);
    }
  });

  router.put("/namespaces/:namespace/workspaces/:workspace/repositories/:from/:to", (req, res, next) => {
    try {
      const { namespace, workspace } = WorkspaceParams.parse(req.params);
      const { from, to } = Rename.parse(req.params);
      catalog.renameRepository(namespace, workspace, from, to);
      res.json({ ok: true, repository: to });
    } catch (err) {
      next(err);
    }
  });

  router.delete("/namespaces/:namespace/workspaces/:workspace/repositories/:repository", (req, res, next) => {
    try {
      const { namespace, workspace, repository } = RepositoryParams.parse(req.params);
      catalog.deleteRepository(namespace, workspace, repository);
      res.json({ ok: true });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
