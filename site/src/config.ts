export class Config {
  static readonly SOURCE_DIR = envStr("AGM_SOURCE_DIR", "content");
  static readonly OUTPUT_DIR = envStr("AGM_OUTPUT_DIR", "public");
  static readonly TEMPLATE_DIR = envStr("AGM_TEMPLATE_DIR", "templates");
  static readonly DEFAULT_TEMPLATE = envStr("AGM_DEFAULT_TEMPLATE", "page");
  static readonly SITE_TITLE = envStr("AGM_SITE_TITLE", "");
  static readonly SERVE_HOST = envStr("AGM_SERVE_HOST", "127.0.0.1");
  static readonly SERVE_PORT = envNum("AGM_SERVE_PORT", 8080);
  static readonly LOG_FORMAT = envStr("AGM_LOG_FORMAT", "");
}

export function envStr(name: string, def?: string, treatEmptyAsUndefined = false): string {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  return v;
}

export function envNum(name: string, def?: number, treatEmptyAsUndefined = false): number {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  const n = Number(v);
  if (isNaN(n)) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} is not a valid number: ${v}`);
  }
  return n;
}
