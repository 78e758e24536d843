import YAML from "yaml";
import type { ZodError } from "zod";
import { ConfigurationError } from "../errors/RelayError.js";
import { createModelModeResolver } from "../providers/openai/models.js";
import type { OpenAIProviderOptions } from "../providers/openai/provider.js";
import type { PricingLookup } from "../providers/usage.js";
import { Tracer } from "../tracer/tracer.js";
import type { TraceWriter, TracingContext } from "../tracer/types.js";
import { SimpleWriter } from "../tracer/writers/simple.js";
import { searchAndLoadFile } from "../utils/file.js";
import { type ProviderConfig, ProviderConfigSchema } from "./schemas.js";

const DEFAULT_CONFIG_NAME = "chatrelay.config";
const DEFAULT_CONFIG_FORMATS = ["yaml", "yml", "json"];

export async function getProviderConfig(
  configPath: string | null,
  context: {
    tracer?: TracingContext;
    cwd?: string;
  } = {},
): Promise<ProviderConfig> {
  const { tracer, cwd } = context;
  const { content, format, path } = await searchAndLoadFile(configPath, {
    defaults: {
      name: DEFAULT_CONFIG_NAME,
      formats: DEFAULT_CONFIG_FORMATS,
    },
    tag: "Config file",
    cwd,
  });

  const raw = parseConfigContent(content, format, path);
  tracer?.debug("Loaded config file", { path, format });

  return parseProviderConfig(raw);
}

export function parseProviderConfig(raw: unknown): ProviderConfig {
  const parsed = ProviderConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`The config file is not valid:\n${formatZodError(parsed.error)}`, {
      details: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

export function pricingFromConfig(config: ProviderConfig): PricingLookup {
  const table = config.pricing ?? {};
  return (model) => table[model];
}

function parseConfigContent(content: string, format: string, path: string): unknown {
  try {
    if (format === "json") {
      return JSON.parse(content);
    }
    if (format === "yaml" || format === "yml") {
      return YAML.parse(content);
    }
  } catch (e) {
    throw new ConfigurationError(`Could not parse config file ${path}`, { cause: e });
  }
  throw new ConfigurationError(`Invalid config file format: ${format}`);
}

/**
 * Formats a Zod error into a readable string
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join(".");
      return `  - ${path || "root"}: ${issue.message}`;
    })
    .join("\n");
}

/**
 * Provider options a config file determines. Credentials are passed per call.
 */
export function providerOptionsFromConfig(config: ProviderConfig): OpenAIProviderOptions {
  return {
    pricing: pricingFromConfig(config),
    ...(config["completion-models"]
      ? { resolveModelMode: createModelModeResolver(config["completion-models"]) }
      : {}),
  };
}

export function tracerFromConfig(
  config: ProviderConfig,
  writers: TraceWriter[] = [new SimpleWriter({ minLevel: config["log-level"] })],
): Tracer {
  return new Tracer({ minLevel: config["log-level"], writers });
}
