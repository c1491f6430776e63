import { ConfigError, formatError } from "@weekreport/core";
import { z } from "zod";

const isoDate = z.string().trim().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

export const weekreportOptionsSchema = z.object({
  user: z.string().trim().min(1).optional(),
  token: z.string().trim().min(1).optional(),
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
  startOfWeek: z.string().trim().min(1).default("Saturday"),
  weeksBack: z.coerce.number().int().min(0).default(1),
  timezone: z.string().trim().min(1).optional()
});

export type WeekreportOptions = z.infer<typeof weekreportOptionsSchema>;
export type OptionValues = Partial<Record<keyof WeekreportOptions, string>>;

export interface FlagSpec {
  key: keyof WeekreportOptions;
  description: string;
}

export const FLAGS: Record<string, FlagSpec> = {
  user: { key: "user", description: "Your GitHub username." },
  token: { key: "token", description: "Your GitHub access token." },
  start_date: { key: "startDate", description: "The start date in ISO layout, e.g. YYYY-MM-DD." },
  end_date: { key: "endDate", description: "The end date in ISO layout, e.g. YYYY-MM-DD." },
  start_of_week: { key: "startOfWeek", description: "The first day of your report week (default Saturday)." },
  weeks_back: { key: "weeksBack", description: "The number of weeks ago to report on (default 1)." },
  timezone: { key: "timezone", description: "IANA timezone the week starts in (default: system timezone)." }
};

export interface ParsedArgs {
  help: boolean;
  values: OptionValues;
}

/** Accepts `-flag value`, `--flag value`, `-flag=value` and `--flag=value`. */
export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = { help: false, values: {} };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg) {
      continue;
    }

    if (arg === "-h" || arg === "-help" || arg === "--help") {
      result.help = true;
      continue;
    }

    if (!arg.startsWith("-")) {
      throw new ConfigError("InvalidOption", `Unexpected argument: ${arg}`);
    }

    const body = arg.replace(/^--?/, "");
    const eq = body.indexOf("=");
    const name = eq >= 0 ? body.slice(0, eq) : body;
    const spec = FLAGS[name];
    if (!spec) {
      throw new ConfigError("InvalidOption", `Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = body.slice(eq + 1);
    } else {
      value = args[i + 1];
      i += 1;
    }
    if (!value) {
      throw new ConfigError("InvalidOption", `Missing value for -${name}`);
    }

    result.values[spec.key] = value;
  }

  return result;
}

export function parseOptions(raw: OptionValues): WeekreportOptions {
  const parsed = weekreportOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("InvalidOption", formatError(parsed.error), { cause: parsed.error });
  }
  return parsed.data;
}
