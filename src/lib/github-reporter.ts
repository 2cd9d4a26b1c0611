/**
 * GitHub Issue Client - reads an issue and posts comments to it
 *
 * Used to leave a trail of breaker trips on a tracking issue.
 *
 * Environment Variables:
 *   GITHUB_TOKEN         - token with issues read/write access
 *   GITHUB_REPO          - owner/repo
 *   GITHUB_ISSUE_NUMBER  - tracking issue for breaker comments
 *
 * Comments are sanitized (keys, tokens, long hex) and rate limited per hour.
 */

import axios from "axios";
import type { BreakerReason, BreakerStatus } from "../core/breakers";
import { GitHubError, toError } from "../errors/app.errors";
import { formatBreakerStatus } from "../telegram/reports";
import type { Logger } from "../utils/logger.util";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface GitHubIssue {
  number: number;
  title: string;
  state: string;
  body: string;
  comments: GitHubComment[];
}

export interface GitHubComment {
  id: number;
  author: string;
  body: string;
  createdAt: string;
}

export interface HttpRequest {
  method: "GET" | "POST";
  url: string;
  headers: Record<string, string>;
  body?: unknown;
}

export interface HttpResponse {
  status: number;
  data: unknown;
}

export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export interface GitHubIssueClientConfig {
  token: string;
  /** owner/repo */
  repo: string;
  /** Max comments posted per hour (default: 10) */
  maxCommentsPerHour: number;
  apiBaseUrl: string;
}

const DEFAULT_CONFIG: Omit<GitHubIssueClientConfig, "token" | "repo"> = {
  maxCommentsPerHour: 10,
  apiBaseUrl: "https://api.github.com",
};

const PRIVATE_KEY_PATTERN = /0x[a-fA-F0-9]{64}/g;

const ADDRESS_PATTERN = /0x[a-fA-F0-9]{40}(?![a-fA-F0-9])/g;

const SENSITIVE_PATTERNS = [
  /[a-fA-F0-9]{32,}/g, // API keys/tokens
  /Bearer\s+[^\s]+/gi, // Bearer tokens
  /Basic\s+[^\s]+/gi, // Basic auth
];

const REPO_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

const HOUR_MS = 3_600_000;

export const axiosTransport: HttpTransport = async (request) => {
  const response = await axios.request<unknown>({
    method: request.method,
    url: request.url,
    headers: request.headers,
    data: request.body,
    timeout: 10_000,
    validateStatus: () => true,
  });
  return { status: response.status, data: response.data };
};

/**
 * Redact secrets and shorten addresses before text leaves the process
 */
export function sanitize(value: string): string {
  let result = value
    .replace(PRIVATE_KEY_PATTERN, "[REDACTED]")
    .replace(ADDRESS_PATTERN, (match) => `${match.slice(0, 8)}...${match.slice(-6)}`);
  for (const pattern of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, "[REDACTED]");
  }
  return result;
}

// ═══════════════════════════════════════════════════════════════════════════
// GITHUB ISSUE CLIENT
// ═══════════════════════════════════════════════════════════════════════════

export class GitHubIssueClient {
  private readonly config: GitHubIssueClientConfig;
  private readonly transport: HttpTransport;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private posted: number[] = [];

  constructor(
    config: Pick<GitHubIssueClientConfig, "token" | "repo"> & Partial<GitHubIssueClientConfig>,
    options: { transport?: HttpTransport; logger?: Logger; now?: () => number } = {},
  ) {
    if (!REPO_PATTERN.test(config.repo)) {
      throw new GitHubError(`A repository must be specified as owner/repo (got "${config.repo}")`);
    }
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.transport = options.transport ?? axiosTransport;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Issue metadata plus all of its comments
   */
  async readIssue(issueNumber: number): Promise<GitHubIssue> {
    const data = await this.call("GET", `/issues/${issueNumber}`);
    if (!isRecord(data) || typeof data.number !== "number") {
      throw new GitHubError(`Issue #${issueNumber}: unexpected response shape`);
    }
    return {
      number: data.number,
      title: typeof data.title === "string" ? data.title : "",
      state: typeof data.state === "string" ? data.state : "unknown",
      body: typeof data.body === "string" ? data.body : "",
      comments: await this.fetchComments(issueNumber),
    };
  }

  async listComments(issueNumber: number, limit?: number): Promise<GitHubComment[]> {
    const comments = await this.fetchComments(issueNumber);
    return limit === undefined ? comments : comments.slice(0, Math.max(0, limit));
  }

  /**
   * @returns the created comment id
   */
  async createComment(issueNumber: number, body: string): Promise<number> {
    const data = await this.call("POST", `/issues/${issueNumber}/comments`, {
      body: sanitize(body),
    });
    if (!isRecord(data) || typeof data.id !== "number") {
      throw new GitHubError(`Comment on #${issueNumber}: unexpected response shape`);
    }
    return data.id;
  }

  /**
   * Post a breaker trip to the tracking issue. Rate limited; failures are
   * logged and reported as false.
   */
  async reportBreakerTrip(
    issueNumber: number,
    reason: BreakerReason,
    status: BreakerStatus,
  ): Promise<boolean> {
    const now = this.now();
    this.posted = this.posted.filter((t) => now - t < HOUR_MS);
    if (this.posted.length >= this.config.maxCommentsPerHour) {
      this.logger?.warn(`[GitHub] Comment rate limit reached, not reporting ${reason}`);
      return false;
    }
    const body = [
      `### 🚨 Breaker tripped: \`${reason}\``,
      "",
      `**Timestamp**: ${new Date(now).toISOString()}`,
      "",
      "```",
      formatBreakerStatus(status),
      "```",
    ].join("\n");
    try {
      await this.createComment(issueNumber, body);
      this.posted.push(now);
      this.logger?.info(`[GitHub] Reported ${reason} on #${issueNumber}`);
      return true;
    } catch (err) {
      const error = toError(err);
      this.logger?.error(`[GitHub] Failed to report ${reason}: ${error.message}`, error);
      return false;
    }
  }

  private async fetchComments(issueNumber: number): Promise<GitHubComment[]> {
    const data = await this.call("GET", `/issues/${issueNumber}/comments`);
    if (!Array.isArray(data)) {
      throw new GitHubError(`Comments of #${issueNumber}: expected an array`);
    }
    return data.filter(isRecord).map((c) => ({
      id: typeof c.id === "number" ? c.id : 0,
      author: isRecord(c.user) && typeof c.user.login === "string" ? c.user.login : "unknown",
      body: typeof c.body === "string" ? c.body : "",
      createdAt: typeof c.created_at === "string" ? c.created_at : "",
    }));
  }

  private async call(method: "GET" | "POST", path: string, body?: unknown): Promise<unknown> {
    const url = `${this.config.apiBaseUrl}/repos/${this.config.repo}${path}`;
    let response: HttpResponse;
    try {
      response = await this.transport({
        method,
        url,
        headers: {
          Authorization: `token ${this.config.token}`,
          Accept: "application/vnd.github.v3+json",
          "Content-Type": "application/json",
        },
        body,
      });
    } catch (err) {
      throw new GitHubError(`${method} ${path} failed: ${toError(err).message}`, undefined, toError(err));
    }
    if (response.status < 200 || response.status >= 300) {
      const message =
        isRecord(response.data) && typeof response.data.message === "string"
          ? response.data.message
          : "request failed";
      throw new GitHubError(`${method} ${path} -> ${response.status}: ${message}`, response.status);
    }
    return response.data;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
