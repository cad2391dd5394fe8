/**
 * YAML 설정 로더
 *
 * - config.yaml 검색 (CONFIG_PATH 지정 시 해당 파일만)
 * - 같은 이름의 대문자 환경변수로 키별 오버라이드 (db_host ← DB_HOST)
 * - Zod 스키마 검증
 *
 * 싱글톤 없이 startup에서 한 번 로드해 각 컴포넌트로 전달한다.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { SERVER_DEFAULTS } from "./constants";

/**
 * 설정 로드 실패
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * 숫자 설정값 (YAML 숫자 또는 환경변수 문자열)
 */
const numeric = (schema: z.ZodNumber) =>
  z.preprocess(
    (val) => (typeof val === "string" && val.trim() !== "" ? Number(val) : val),
    schema.int(),
  );

/**
 * 애플리케이션 설정 스키마
 */
export const AppConfigSchema = z.object({
  db_host: z.string().min(1),
  db_port: numeric(z.number().min(1).max(65535)),
  db_user: z.string().min(1),
  db_password: z.string().default(""),
  db_name: z.string().min(1),
  db_sslmode: z.enum(["disable", "require"]).default("disable"),
  db_pool_max: numeric(z.number().min(1)).default(10),
  server_port: numeric(z.number().min(0).max(65535)),
  shutdown_timeout_ms: numeric(z.number().min(0)).default(
    SERVER_DEFAULTS.SHUTDOWN_TIMEOUT_MS,
  ),
  log_level: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  log_dir: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * 값이 비어 있으면 안 되는 키
 */
const REQUIRED_KEYS = [
  "db_host",
  "db_port",
  "db_user",
  "db_name",
  "server_port",
] as const;

const CONFIG_KEYS = AppConfigSchema.keyof().options;

export interface ConfigLoaderOptions {
  /** 검색 디렉토리 (기본값: cwd, cwd/configs) */
  searchDirs?: string[];
  /** 설정 파일명 (기본값: config.yaml) */
  fileName?: string;
  /** 환경변수 (기본값: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Config Loader
 */
export class ConfigLoader {
  private readonly searchDirs: string[];
  private readonly fileName: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigLoaderOptions = {}) {
    const cwd = process.cwd();
    this.searchDirs = options.searchDirs ?? [cwd, path.join(cwd, "configs")];
    this.fileName = options.fileName ?? "config.yaml";
    this.env = options.env ?? process.env;
  }

  /**
   * 설정 로드 + 검증
   */
  load(): AppConfig {
    const configPath = this.resolveConfigPath();
    const fileValues = this.readYaml(configPath);
    const merged = this.applyEnvOverrides(fileValues);

    const missing = REQUIRED_KEYS.filter((key) => {
      const value = merged[key];
      return value === undefined || value === null || String(value).trim() === "";
    });
    if (missing.length > 0) {
      throw new ConfigError(
        `missing required configuration: ${missing.join(", ")}`,
      );
    }

    const result = AppConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(
        `invalid configuration: ${result.error.errors
          .map((e) => `${e.path.join(".")}: ${e.message}`)
          .join(", ")}`,
      );
    }

    return result.data;
  }

  /**
   * 설정 파일 경로 결정
   * CONFIG_PATH가 있으면 그 파일만, 없으면 검색 디렉토리 순서대로
   */
  resolveConfigPath(): string {
    const explicitPath = this.env.CONFIG_PATH;
    if (explicitPath) {
      if (!fs.existsSync(explicitPath)) {
        throw new ConfigError(`Config file not found: ${explicitPath}`);
      }
      return explicitPath;
    }

    for (const dir of this.searchDirs) {
      const candidate = path.join(dir, this.fileName);
      if (fs.existsSync(candidate)) {
        return candidate;
      }
    }

    throw new ConfigError(
      `Config file ${this.fileName} not found in: ${this.searchDirs.join(", ")}`,
    );
  }

  private readYaml(configPath: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(configPath, "utf8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`failed to read config file ${configPath}: ${message}`);
    }

    // 빈 파일은 환경변수만으로 구성
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ConfigError(`config file ${configPath} must contain a mapping`);
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private applyEnvOverrides(
    values: Record<string, unknown>,
  ): Record<string, unknown> {
    const merged = { ...values };
    for (const key of CONFIG_KEYS) {
      const envValue = this.env[key.toUpperCase()];
      if (envValue !== undefined && envValue !== "") {
        merged[key] = envValue;
      }
    }
    return merged;
  }
}

/**
 * 로그 출력용 (비밀번호 제외)
 */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  const { db_password: _password, ...rest } = config;
  return rest;
}
