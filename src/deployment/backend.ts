import { z } from "zod";
import { flexservToken } from "./auth-token.js";

const commandPrefixSchema = z.array(z.string().min(1)).min(1).optional();
const positiveInt = z.number().int().positive();
const fraction = z.number().gt(0).lte(1);

export const transformersBackendSchema = z.object({
  kind: z.literal("transformers"),
  commandPrefix: commandPrefixSchema,
  device: z.string().min(1).optional(),
  dtype: z.string().min(1).optional(),
  quantization: z.string().min(1).optional(),
  attnImplementation: z.string().min(1).optional(),
  logLevel: z.string().min(1).optional(),
  trustRemoteCode: z.boolean().optional(),
  continuousBatching: z.boolean().optional(),
  enableCors: z.boolean().optional(),
  forceDefaultModel: z.boolean().optional(),
  forceDefaultEmbeddingModel: z.boolean().optional(),
});

export const vllmBackendSchema = z.object({
  kind: z.literal("vllm"),
  commandPrefix: commandPrefixSchema,
  tensorParallelSize: positiveInt.optional(),
  pipelineParallelSize: positiveInt.optional(),
  maxModelLen: positiveInt.optional(),
  gpuMemoryUtilization: fraction.optional(),
});

export const sglangBackendSchema = z.object({
  kind: z.literal("sglang"),
  commandPrefix: commandPrefixSchema,
  tpSize: positiveInt.optional(),
  memFractionStatic: fraction.optional(),
});

export const trtllmBackendSchema = z.object({
  kind: z.literal("trtllm"),
  commandPrefix: commandPrefixSchema,
  maxBatchSize: positiveInt.optional(),
  maxInputLen: positiveInt.optional(),
});

export const backendSchema = z.discriminatedUnion("kind", [
  transformersBackendSchema,
  vllmBackendSchema,
  sglangBackendSchema,
  trtllmBackendSchema,
]);

export type Backend = z.infer<typeof backendSchema>;
export type BackendKind = Backend["kind"];
export type TransformersBackend = z.infer<typeof transformersBackendSchema>;
export type VLlmBackend = z.infer<typeof vllmBackendSchema>;
export type SGLangBackend = z.infer<typeof sglangBackendSchema>;
export type TrtLlmBackend = z.infer<typeof trtllmBackendSchema>;

export const BACKEND_KINDS: readonly BackendKind[] = ["transformers", "vllm", "sglang", "trtllm"];

/** Where the launch specification will run. */
export type PlatformTarget = "pod" | "hpc";

export interface BackendParameterSet {
  readonly commandPrefix: readonly string[];
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
}

/** Secrets are always carried in the environment, never in args. */
export interface LaunchCredentials {
  flexservSecret?: string;
  hfToken?: string;
}

/** The subset of a server descriptor the launch specification depends on. */
export interface LaunchSubject {
  modelId: string;
  modelRevision?: string;
  defaultEmbeddingModel?: string;
}

export const MODEL_REPO_PATH = "/app/models";
export const SERVER_HOST = "0.0.0.0";
export const SERVER_PORT = 8000;
const HPC_HF_HOME = "/root/.cache/huggingface";

export const DEFAULT_COMMAND_PREFIXES: Readonly<Record<BackendKind, readonly string[]>> = {
  transformers: ["/app/venvs/transformers/bin/python", "/app/flexserv/python/backend/transformers/backend_server.py"],
  vllm: ["/app/venvs/vllm/bin/vllm", "serve"],
  sglang: ["/app/venvs/sglang/bin/python", "-m", "sglang.launch_server"],
  trtllm: ["/app/venvs/trtllm/bin/trtllm-serve"],
};

/** Model directory name on the volume: "org/name" becomes "org_name". */
export function modelDirName(modelId: string): string {
  return modelId.replaceAll("/", "_");
}

export function modelPath(modelId: string): string {
  return `${MODEL_REPO_PATH}/${modelDirName(modelId)}`;
}

/**
 * Build the launch specification for a backend on a target platform.
 * Pure: identical inputs produce identical output.
 */
export function buildParameters(
  backend: Backend,
  subject: LaunchSubject,
  target: PlatformTarget,
  credentials: LaunchCredentials = {},
): BackendParameterSet {
  const token = flexservToken(credentials.flexservSecret ?? "", subject.modelId);
  const env = baseEnv(subject, target, credentials, token);
  switch (backend.kind) {
    case "transformers":
      return freeze(
        backend.commandPrefix ?? DEFAULT_COMMAND_PREFIXES.transformers,
        transformersArgs(backend, subject),
        env,
      );
    case "vllm":
      return freeze(backend.commandPrefix ?? DEFAULT_COMMAND_PREFIXES.vllm, vllmArgs(backend, subject), {
        ...env,
        VLLM_API_KEY: token,
      });
    case "sglang":
      return freeze(backend.commandPrefix ?? DEFAULT_COMMAND_PREFIXES.sglang, sglangArgs(backend, subject), env);
    case "trtllm":
      return freeze(backend.commandPrefix ?? DEFAULT_COMMAND_PREFIXES.trtllm, trtllmArgs(backend, subject), env);
    default:
      return assertNever(backend);
  }
}

function baseEnv(
  subject: LaunchSubject,
  target: PlatformTarget,
  credentials: LaunchCredentials,
  token: string,
): Record<string, string> {
  const env: Record<string, string> = {
    MODEL_REPO: MODEL_REPO_PATH,
    MODEL_NAME: modelDirName(subject.modelId),
    FLEXSERV_PORT: String(SERVER_PORT),
    FLEXSERV_SECRET: credentials.flexservSecret ?? "",
    FLEXSERV_TOKEN: token,
  };
  if (subject.modelRevision) env.MODEL_REVISION = subject.modelRevision;
  if (credentials.hfToken) env.HF_TOKEN = credentials.hfToken;
  if (target === "hpc") {
    env.HF_HOME = HPC_HF_HOME;
    env.HUGGINGFACE_HUB_CACHE = `${HPC_HF_HOME}/hub`;
  }
  return env;
}

class ArgList {
  private readonly items: string[] = [];

  positional(value: string): this {
    this.items.push(value);
    return this;
  }

  option(flag: string, value: string | number | undefined): this {
    if (value !== undefined) this.items.push(flag, String(value));
    return this;
  }

  toggle(flag: string, enabled: boolean | undefined): this {
    if (enabled) this.items.push(flag);
    return this;
  }

  toArray(): string[] {
    return [...this.items];
  }
}

function listen(args: ArgList): ArgList {
  return args.option("--host", SERVER_HOST).option("--port", SERVER_PORT);
}

function transformersArgs(backend: TransformersBackend, subject: LaunchSubject): string[] {
  return listen(new ArgList().positional(modelPath(subject.modelId)))
    .option("--default-embedding-model", subject.defaultEmbeddingModel)
    .option("--device", backend.device)
    .option("--dtype", backend.dtype)
    .option("--quantization", backend.quantization)
    .option("--attn-implementation", backend.attnImplementation)
    .option("--log-level", backend.logLevel)
    .toggle("--trust-remote-code", backend.trustRemoteCode)
    .toggle("--continuous-batching", backend.continuousBatching)
    .toggle("--enable-cors", backend.enableCors)
    .toggle("--force-default-model", backend.forceDefaultModel)
    .toggle("--force-default-embedding-model", backend.forceDefaultEmbeddingModel)
    .toArray();
}

function vllmArgs(backend: VLlmBackend, subject: LaunchSubject): string[] {
  return listen(new ArgList().positional(modelPath(subject.modelId)))
    .option("--served-model-name", subject.modelId)
    .option("--tensor-parallel-size", backend.tensorParallelSize)
    .option("--pipeline-parallel-size", backend.pipelineParallelSize)
    .option("--max-model-len", backend.maxModelLen)
    .option("--gpu-memory-utilization", backend.gpuMemoryUtilization)
    .toArray();
}

function sglangArgs(backend: SGLangBackend, subject: LaunchSubject): string[] {
  return listen(new ArgList().option("--model-path", modelPath(subject.modelId)))
    .option("--served-model-name", subject.modelId)
    .option("--tp-size", backend.tpSize)
    .option("--mem-fraction-static", backend.memFractionStatic)
    .toArray();
}

function trtllmArgs(backend: TrtLlmBackend, subject: LaunchSubject): string[] {
  return listen(new ArgList().positional(modelPath(subject.modelId)))
    .option("--max_batch_size", backend.maxBatchSize)
    .option("--max_input_len", backend.maxInputLen)
    .toArray();
}

function freeze(commandPrefix: readonly string[], args: string[], env: Record<string, string>): BackendParameterSet {
  return Object.freeze({
    commandPrefix: Object.freeze([...commandPrefix]),
    args: Object.freeze(args),
    env: Object.freeze({ ...env }),
  });
}

function assertNever(value: never): never {
  throw new Error(`Unhandled backend: ${JSON.stringify(value)}`);
}
