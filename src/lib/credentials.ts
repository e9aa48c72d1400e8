import { chmod, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { randomUUID } from "node:crypto";
import type { RepositoryEntry } from "../types/index.js";
import { getCredentialsPath } from "./config.js";
import { listRemoteHeads, translateGitError } from "./git.js";

export type CredentialErrorCode = "not-found" | "invalid-format" | "rejected" | "storage";

export class CredentialError extends Error {
  readonly code: CredentialErrorCode;

  constructor(code: CredentialErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CredentialError";
    this.code = code;
  }
}

/**
 * Owns the single access token used for every remote repository
 */
export interface CredentialManager {
  validateTokenFormat(token: string): void;
  validateTokenAgainstUrl(token: string, url: string): Promise<void>;
  validateTokenAgainstEntries(token: string, entries: readonly RepositoryEntry[]): Promise<void>;
  store(token: string): Promise<void>;
  get(): Promise<string>;
}

const TOKEN_PREFIXES = ["ghp_", "github_pat_", "gho_", "ghu_", "ghs_"];
const MIN_TOKEN_LENGTH = 20;

/**
 * Check the shape of a GitHub token without contacting GitHub
 */
export function validateTokenFormat(token: string): void {
  const trimmed = token.trim();

  if (trimmed.length === 0) {
    throw new CredentialError("invalid-format", "token cannot be empty");
  }
  if (/\s/.test(trimmed)) {
    throw new CredentialError("invalid-format", "token cannot contain whitespace");
  }
  if (trimmed.length < MIN_TOKEN_LENGTH) {
    throw new CredentialError(
      "invalid-format",
      `token is too short (minimum ${MIN_TOKEN_LENGTH} characters)`
    );
  }
  if (!TOKEN_PREFIXES.some((prefix) => trimmed.startsWith(prefix))) {
    throw new CredentialError(
      "invalid-format",
      `token must start with one of: ${TOKEN_PREFIXES.join(", ")}`
    );
  }
}

export type RemoteProbe = (url: string, token: string) => Promise<unknown>;

export interface FileCredentialManagerOptions {
  path?: string;
  probe?: RemoteProbe;
}

/**
 * Token stored as JSON in the config directory, readable by the owner only
 */
export class FileCredentialManager implements CredentialManager {
  private readonly path: string;
  private readonly probe: RemoteProbe;

  constructor(options: FileCredentialManagerOptions = {}) {
    this.path = options.path ?? getCredentialsPath();
    this.probe = options.probe ?? ((url, token) => listRemoteHeads(url, token));
  }

  validateTokenFormat(token: string): void {
    validateTokenFormat(token);
  }

  async validateTokenAgainstUrl(token: string, url: string): Promise<void> {
    try {
      await this.probe(url, token.trim());
    } catch (error) {
      const translated = translateGitError("Token check", error);
      if (translated.kind === "auth" || translated.kind === "not-found") {
        throw new CredentialError("rejected", "token is invalid or expired", { cause: error });
      }
      throw translated;
    }
  }

  async validateTokenAgainstEntries(
    token: string,
    entries: readonly RepositoryEntry[]
  ): Promise<void> {
    this.validateTokenFormat(token);

    for (const entry of entries) {
      if (entry.kind !== "remote" || !entry.remoteUrl) continue;

      try {
        await this.validateTokenAgainstUrl(token, entry.remoteUrl);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new CredentialError(
          "rejected",
          `repository '${entry.name}' (${entry.remoteUrl}): ${reason}`,
          { cause: error }
        );
      }
    }
  }

  async store(token: string): Promise<void> {
    const tempPath = join(dirname(this.path), `.credentials.${randomUUID()}.tmp`);

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tempPath, JSON.stringify({ token: token.trim() }, null, 2), {
        encoding: "utf-8",
        mode: 0o600,
      });
      await rename(tempPath, this.path);
      await chmod(this.path, 0o600);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CredentialError("storage", `could not write ${this.path}: ${reason}`, {
        cause: error,
      });
    }
  }

  async get(): Promise<string> {
    const missing = () =>
      new CredentialError(
        "not-found",
        "no GitHub token found. Add one from Settings → Update GitHub PAT"
      );

    if (!existsSync(this.path)) {
      throw missing();
    }

    let data: unknown;
    try {
      data = JSON.parse(await readFile(this.path, "utf-8"));
    } catch (error) {
      throw new CredentialError("storage", `credential file is corrupted: ${this.path}`, {
        cause: error,
      });
    }

    if (
      typeof data !== "object" ||
      data === null ||
      !("token" in data) ||
      typeof data.token !== "string" ||
      data.token.length === 0
    ) {
      throw missing();
    }

    return data.token;
  }
}
