import type { Router } from "express";
import express from "express";
import { z } from "zod";
import {
  bulkTogglePolicies,
  deletePolicy,
  deletePolicyConfig,
  getPolicy,
  getPolicyConfig,
  listPolicies,
  listPolicyConfigs,
  updatePolicyConfig,
  upsertPolicy,
  upsertPolicyConfig
} from "../db/policies.js";
import { SEVERITIES, type Policy } from "../db/types.js";
import {
  CHECK_ID_PATTERN,
  CUSTOM_POLICY_PLATFORMS,
  formatOf,
  removeCustomPolicyFile,
  writeCustomPolicyFile
} from "../lib/customPolicies.js";
import { Conflict, NotFound } from "../lib/errors.js";
import type { AppServices } from "../services.js";
import { Pagination, parseInput, policyConfigView, policyView, requireProject, route } from "./http.js";

const PolicyListQuery = Pagination.extend({
  platform: z.string().optional(),
  severity: z.enum(SEVERITIES).optional(),
  built_in: z.enum(["true", "false"]).transform((v) => v === "true").optional(),
  search: z.string().optional()
});

const CustomPolicyCreateRequest = z
  .object({
    check_id: z.string().regex(CHECK_ID_PATTERN, "check_id may contain letters, digits and underscores").max(100),
    name: z.string().trim().min(1).max(500),
    platform: z.enum(CUSTOM_POLICY_PLATFORMS),
    severity: z.enum(SEVERITIES).default("medium"),
    category: z.string().max(100).default("custom"),
    description: z.string().max(5000).nullable().optional(),
    guideline_url: z.string().url().nullable().optional(),
    format: z.enum(["python", "yaml"]).default("python"),
    code: z.string().min(1)
  })
  .strict();

const CustomPolicyUpdateRequest = z
  .object({
    name: z.string().trim().min(1).max(500).optional(),
    severity: z.enum(SEVERITIES).optional(),
    category: z.string().max(100).optional(),
    description: z.string().max(5000).nullable().optional(),
    guideline_url: z.string().url().nullable().optional(),
    code: z.string().min(1).optional()
  })
  .strict();

const PolicyConfigListQuery = z.object({
  project_id: z.string().optional()
});

const PolicyConfigCreateRequest = z
  .object({
    project_id: z.string().nullable().default(null),
    check_id: z.string().min(1),
    enabled: z.boolean().default(true),
    severity_override: z.enum(SEVERITIES).nullable().default(null),
    custom_message: z.string().max(2000).nullable().default(null)
  })
  .strict();

const PolicyConfigUpdateRequest = z
  .object({
    enabled: z.boolean().optional(),
    severity_override: z.enum(SEVERITIES).nullable().optional(),
    custom_message: z.string().max(2000).nullable().optional()
  })
  .strict();

const BulkToggleRequest = z
  .object({
    project_id: z.string().nullable().default(null),
    check_ids: z.array(z.string().min(1)).min(1).max(1000),
    enabled: z.boolean()
  })
  .strict();

function requireCustomPolicy(policy: Policy | null, check_id: string): Policy {
  if (!policy) throw new NotFound(`policy ${check_id} not found`);
  if (policy.built_in) {
    throw new Conflict(`policy ${check_id} is built in and cannot be changed`, "POLICY_BUILT_IN");
  }
  return policy;
}

export function buildPolicyRouter(services: AppServices): Router {
  const { config, db } = services;
  const router = express.Router();

  router.get(
    "/policies",
    route((req, res) => {
      const query = parseInput(PolicyListQuery, req.query);
      return res.status(200).json({ policies: listPolicies(db, query).map(policyView), limit: query.limit, offset: query.offset });
    })
  );

  router.get(
    "/policies/:check_id",
    route((req, res) => {
      const policy = getPolicy(db, req.params.check_id);
      if (!policy) throw new NotFound(`policy ${req.params.check_id} not found`);
      return res.status(200).json(policyView(policy));
    })
  );

  router.post(
    "/policies/custom",
    route((req, res) => {
      const input = parseInput(CustomPolicyCreateRequest, req.body);
      if (getPolicy(db, input.check_id)) {
        throw new Conflict(`policy ${input.check_id} already exists`);
      }
      const file_path = writeCustomPolicyFile(config.CUSTOM_POLICIES_DIR, input);
      const policy = upsertPolicy(db, {
        check_id: input.check_id,
        name: input.name,
        platform: input.platform,
        severity: input.severity,
        category: input.category,
        description: input.description ?? input.name,
        guideline_url: input.guideline_url ?? null,
        built_in: false,
        file_path,
        code: input.code
      });
      console.log(`Custom policy created check_id=${policy.check_id} platform=${policy.platform} file=${file_path}`);
      return res.status(201).json(policyView(policy));
    })
  );

  router.put(
    "/policies/custom/:check_id",
    route((req, res) => {
      const current = requireCustomPolicy(getPolicy(db, req.params.check_id), req.params.check_id);
      const patch = parseInput(CustomPolicyUpdateRequest, req.body);
      let file_path = current.file_path;
      if (patch.code !== undefined) {
        file_path = writeCustomPolicyFile(config.CUSTOM_POLICIES_DIR, {
          platform: current.platform,
          check_id: current.check_id,
          format: formatOf(current.file_path),
          code: patch.code
        });
      }
      const { created_at: _created, updated_at: _updated, ...base } = current;
      const policy = upsertPolicy(db, { ...base, ...patch, file_path });
      return res.status(200).json(policyView(policy));
    })
  );

  router.delete(
    "/policies/custom/:check_id",
    route((req, res) => {
      const policy = requireCustomPolicy(getPolicy(db, req.params.check_id), req.params.check_id);
      removeCustomPolicyFile(policy.file_path);
      deletePolicy(db, policy.check_id);
      console.log(`Custom policy deleted check_id=${policy.check_id}`);
      return res.status(204).end();
    })
  );

  router.get(
    "/policy-configs",
    route((req, res) => {
      const query = parseInput(PolicyConfigListQuery, req.query);
      if (query.project_id) requireProject(db, query.project_id);
      const configs = listPolicyConfigs(db, query.project_id ? { project_id: query.project_id } : {});
      return res.status(200).json({ policy_configs: configs.map(policyConfigView) });
    })
  );

  router.post(
    "/policy-configs",
    route((req, res) => {
      const input = parseInput(PolicyConfigCreateRequest, req.body);
      if (input.project_id) requireProject(db, input.project_id);
      const saved = upsertPolicyConfig(db, input);
      return res.status(201).json(policyConfigView(saved));
    })
  );

  router.post(
    "/policy-configs/bulk-toggle",
    route((req, res) => {
      const input = parseInput(BulkToggleRequest, req.body);
      if (input.project_id) requireProject(db, input.project_id);
      const configs = bulkTogglePolicies(db, input);
      console.log(`Policies toggled enabled=${input.enabled} count=${configs.length} project_id=${input.project_id ?? "global"}`);
      return res.status(200).json({ updated: configs.length, policy_configs: configs.map(policyConfigView) });
    })
  );

  router.put(
    "/policy-configs/:config_id",
    route((req, res) => {
      const patch = parseInput(PolicyConfigUpdateRequest, req.body);
      const updated = updatePolicyConfig(db, req.params.config_id, patch);
      if (!updated) throw new NotFound("policy config not found");
      return res.status(200).json(policyConfigView(updated));
    })
  );

  router.delete(
    "/policy-configs/:config_id",
    route((req, res) => {
      if (!getPolicyConfig(db, req.params.config_id)) throw new NotFound("policy config not found");
      deletePolicyConfig(db, req.params.config_id);
      return res.status(204).end();
    })
  );

  return router;
}
