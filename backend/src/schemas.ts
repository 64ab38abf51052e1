/**
 * Cellar Backend — Request Validation Schemas (Zod)
 *
 * All tool-server input is validated before hitting handlers. Agents
 * sometimes wrap a string argument in a one-element list; that is
 * accepted wherever a string is expected.
 */

import { z } from "zod";

/** A non-empty string, or a one-element list holding one */
const argString = z
  .union([z.string(), z.tuple([z.string()]).transform(([value]) => value)])
  .pipe(z.string().trim().min(1));

// ─── JSON-RPC Envelope ───────────────────────────────────────

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

export const ToolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional().default({}),
});

// ─── Tool Arguments ──────────────────────────────────────────

export const BottlesInstallerArgsSchema = z.object({
  program_path: argString,
  bottle_name: argString.optional(),
  kind: z.enum(["file", "folder", "unknown"]).optional().default("unknown"),
  strategy: z.enum(["file", "folder"]).optional(),
});

export const InstallDepsArgsSchema = z.object({
  program_path: argString,
  bottle_name: argString,
});

export const JobArgsSchema = z.object({
  job_id: argString.pipe(z.string().uuid()),
});

export const AnalyzeArgsSchema = z.object({
  program_path: argString,
});

export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;
export type BottlesInstallerArgs = z.infer<typeof BottlesInstallerArgsSchema>;
export type InstallDepsArgs = z.infer<typeof InstallDepsArgsSchema>;
export type JobArgs = z.infer<typeof JobArgsSchema>;
export type AnalyzeArgs = z.infer<typeof AnalyzeArgsSchema>;
