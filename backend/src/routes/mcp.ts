/**
 * Cellar Backend — Agent Tool Route
 *
 * POST /mcp — JSON-RPC 2.0 endpoint speaking the Model Context Protocol
 * tool subset: initialize, tools/list and tools/call.
 *
 * Tools:
 *   bottles_installer      start a background install, returns a job id
 *   bottles_install_deps   install a binary's runtime components into a bottle
 *   install_status         job status and outcome (either kind)
 *   cancel_install         cooperative cancellation of a running job
 *   analyze_dependencies   dependency report for a binary (dry run)
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { InstallError, resolveBottleName, InstallRequest, Logger } from '@cellar/engine';
import { Job, JobRegistry } from '../jobs';
import { InstallService } from '../service';
import {
  AnalyzeArgsSchema,
  BottlesInstallerArgsSchema,
  InstallDepsArgsSchema,
  JobArgsSchema,
  JsonRpcRequestSchema,
  ToolCallParamsSchema,
} from '../schemas';

export const PROTOCOL_VERSION = '2024-11-05';

/** JSON-RPC error codes */
export const RpcCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  TOOL_FAILED: -32000,
} as const;

type JsonRpcId = string | number | null;

class RpcError extends Error {
  constructor(
    readonly code: number,
    message: string,
  ) {
    super(message);
    this.name = 'RpcError';
  }
}

interface ToolResult {
  content: { type: 'text'; text: string }[];
  structuredContent?: object;
}

interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: object;
}

const stringArg = { type: 'string' } as const;

export const TOOLS: ToolDefinition[] = [
  {
    name: 'bottles_installer',
    description:
      'Install a Windows program (installer .exe/.msi, disk image .iso, or extracted folder) into a Bottles bottle. ' +
      'Runs in the background; returns a job id for install_status.',
    inputSchema: {
      type: 'object',
      properties: {
        program_path: stringArg,
        bottle_name: stringArg,
        kind: { type: 'string', enum: ['file', 'folder', 'unknown'] },
        strategy: { type: 'string', enum: ['file', 'folder'] },
      },
      required: ['program_path'],
    },
  },
  {
    name: 'bottles_install_deps',
    description:
      'Install the runtime components a Windows binary needs (Visual C++ runtimes, DirectX, .NET) into a bottle ' +
      'without running it. Creates the bottle if missing. Runs in the background; returns a job id for install_status.',
    inputSchema: {
      type: 'object',
      properties: { program_path: stringArg, bottle_name: stringArg },
      required: ['program_path', 'bottle_name'],
    },
  },
  {
    name: 'install_status',
    description: 'Status of an install job, with its outcome once finished.',
    inputSchema: {
      type: 'object',
      properties: { job_id: stringArg },
      required: ['job_id'],
    },
  },
  {
    name: 'cancel_install',
    description: 'Cancel a running install job after its current step.',
    inputSchema: {
      type: 'object',
      properties: { job_id: stringArg },
      required: ['job_id'],
    },
  },
  {
    name: 'analyze_dependencies',
    description: 'Scan a Windows binary for imported libraries and the runtime components they need (dry run).',
    inputSchema: {
      type: 'object',
      properties: { program_path: stringArg },
      required: ['program_path'],
    },
  },
];

function parseParams<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`)
      .join('; ');
    throw new RpcError(RpcCode.INVALID_PARAMS, issues);
  }
  return parsed.data;
}

function text(message: string, structuredContent?: object): ToolResult {
  return { content: [{ type: 'text', text: message }], structuredContent };
}

function checkBottleName(request: InstallRequest): void {
  try {
    resolveBottleName(request);
  } catch (err: unknown) {
    if (err instanceof InstallError) throw new RpcError(RpcCode.INVALID_PARAMS, err.message);
    throw err;
  }
}

function describeJob(job: Job): string {
  const lines = [`Job ${job.id}: ${job.status}`];
  const outcome = job.outcome;
  if (outcome) {
    lines.push(`Bottle: ${outcome.bottle_name}`);
    if (outcome.installed_components.length > 0) {
      lines.push(`Installed components: ${outcome.installed_components.join(', ')}`);
    }
    if (job.kind === 'install' && job.outcome?.shortcut) {
      const { shortcut } = job.outcome;
      lines.push(`Shortcut: ${shortcut.display_name} -> ${shortcut.target_executable_path}`);
    }
    if (outcome.error) {
      lines.push(`Error (${outcome.error.stage}): ${outcome.error.message}`);
    }
  }
  if (job.error) {
    lines.push(`Error: ${job.error}`);
  }
  return lines.join('\n');
}

export function mcpRoutes(
  jobs: JobRegistry,
  service: InstallService,
  logger: Logger,
  version: string,
): Router {
  const router = Router();

  async function callTool(name: string, args: unknown): Promise<ToolResult> {
    switch (name) {
      case 'bottles_installer': {
        const parsed = parseParams(BottlesInstallerArgsSchema, args);
        const request: InstallRequest = {
          target_path: parsed.program_path,
          declared_kind: parsed.kind,
          bottle_name: parsed.bottle_name,
          strategy_hint: parsed.strategy,
        };
        checkBottleName(request);
        const job = jobs.startInstall(request);
        return text(`Install job ${job.id} started for ${request.target_path}`, {
          job_id: job.id,
          status: job.status,
        });
      }

      case 'bottles_install_deps': {
        const parsed = parseParams(InstallDepsArgsSchema, args);
        checkBottleName({ target_path: parsed.program_path, declared_kind: 'file', bottle_name: parsed.bottle_name });
        const job = jobs.startDependencies({ binary_path: parsed.program_path, bottle_name: parsed.bottle_name });
        return text(`Dependency job ${job.id} started for ${parsed.program_path}`, {
          job_id: job.id,
          status: job.status,
        });
      }

      case 'install_status': {
        const { job_id } = parseParams(JobArgsSchema, args);
        const job = jobs.get(job_id);
        if (!job) throw new RpcError(RpcCode.TOOL_FAILED, `No install job ${job_id}`);
        return text(describeJob(job), job);
      }

      case 'cancel_install': {
        const { job_id } = parseParams(JobArgsSchema, args);
        const job = jobs.cancel(job_id);
        if (!job) throw new RpcError(RpcCode.TOOL_FAILED, `No install job ${job_id}`);
        const message =
          job.status === 'running'
            ? `Cancellation requested for job ${job.id}`
            : `Job ${job.id} already ${job.status}`;
        return text(message, { job_id: job.id, status: job.status, cancel_requested: job.cancel_requested });
      }

      case 'analyze_dependencies': {
        const { program_path } = parseParams(AnalyzeArgsSchema, args);
        const report = await service.analyze(program_path);
        if (report.scan_error) {
          throw new RpcError(RpcCode.TOOL_FAILED, `Cannot analyze ${program_path}: ${report.scan_error}`);
        }
        const lines = [
          `Found ${report.resolved_components.length} component(s) for ${report.detected_imports.length} import(s)`,
          ...report.resolved_components.map((c) => `${c.id} (${c.provided_by})`),
        ];
        if (report.unresolved_imports.length > 0) {
          lines.push(`Unresolved: ${report.unresolved_imports.join(', ')}`);
        }
        return text(lines.join('\n'), report);
      }

      default:
        throw new RpcError(RpcCode.METHOD_NOT_FOUND, `Tool not found: ${name}`);
    }
  }

  async function dispatch(method: string, params: unknown): Promise<unknown> {
    switch (method) {
      case 'initialize':
        return {
          protocolVersion: PROTOCOL_VERSION,
          serverInfo: { name: 'cellar', version },
          capabilities: { tools: {} },
        };
      case 'ping':
        return {};
      case 'tools/list':
        return { tools: TOOLS };
      case 'tools/call': {
        const call = parseParams(ToolCallParamsSchema, params);
        return callTool(call.name, call.arguments);
      }
      default:
        throw new RpcError(RpcCode.METHOD_NOT_FOUND, `Method not supported: ${method}`);
    }
  }

  // POST /mcp
  router.post('/', async (req: Request, res: Response) => {
    const envelope = JsonRpcRequestSchema.safeParse(req.body);
    if (!envelope.success) {
      res.json({
        jsonrpc: '2.0',
        id: null,
        error: { code: RpcCode.INVALID_REQUEST, message: 'Invalid JSON-RPC request' },
      });
      return;
    }

    const { id, method, params } = envelope.data;
    // Notifications get no response body
    if (id === undefined) {
      logger.debug({ method }, 'Notification received');
      res.status(202).end();
      return;
    }

    const replyId: JsonRpcId = id;
    try {
      const result = await dispatch(method, params);
      res.json({ jsonrpc: '2.0', id: replyId, result });
    } catch (err: unknown) {
      if (err instanceof RpcError) {
        logger.warn({ method, code: err.code, error: err.message }, 'Tool request rejected');
        res.json({ jsonrpc: '2.0', id: replyId, error: { code: err.code, message: err.message } });
        return;
      }
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ method, error: message }, 'Tool request failed');
      res.json({ jsonrpc: '2.0', id: replyId, error: { code: RpcCode.TOOL_FAILED, message } });
    }
  });

  return router;
}
