import { z } from "zod";
import { UpstreamHttpError, UpstreamRejectedError } from "@pagesmith/shared";

const RepositorySchema = z.object({
  name: z.string(),
  full_name: z.string(),
  html_url: z.string(),
  default_branch: z.string(),
  owner: z.object({ login: z.string() }),
});

export type GitHubRepository = z.infer<typeof RepositorySchema>;

const RefSchema = z.object({ object: z.object({ sha: z.string() }) });
const CommitSchema = z.object({ sha: z.string(), tree: z.object({ sha: z.string() }) });
const ShaSchema = z.object({ sha: z.string() });
const ViewerSchema = z.object({ login: z.string() });
const PagesBuildSchema = z.object({
  status: z.string(),
  commit: z.string().nullable(),
  error: z.object({ message: z.string().nullable() }).optional(),
});

export type PagesBuild = z.infer<typeof PagesBuildSchema>;
const AnySchema = z.unknown();

export type TreeEntry = {
  path: string;
  mode: "100644";
  type: "blob";
  sha: string;
};

export type BranchHead = {
  commitSha: string;
  treeSha: string;
};

export function readGitHubToken() {
  const token = process.env.GITHUB_TOKEN;
  if (!token) {
    throw new UpstreamRejectedError("GitHub publication requires GITHUB_TOKEN.");
  }
  return token;
}

/** Thin REST client over the endpoints publication needs. Every response body is validated. */
export class GitHubClient {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly signal?: AbortSignal;

  constructor(opts: { token?: string; baseUrl?: string; signal?: AbortSignal } = {}) {
    this.token = opts.token ?? readGitHubToken();
    this.baseUrl = (opts.baseUrl ?? process.env.GITHUB_API_BASE_URL ?? "https://api.github.com").replace(/\/+$/, "");
    this.signal = opts.signal;
  }

  async getAuthenticatedLogin() {
    return (await this.request("GET", "/user", ViewerSchema)).login;
  }

  async findRepository(owner: string, repo: string): Promise<GitHubRepository | undefined> {
    return this.requestOptional("GET", `/repos/${owner}/${repo}`, RepositorySchema);
  }

  async createRepository(input: { name: string; description?: string }) {
    return this.request("POST", "/user/repos", RepositorySchema, {
      name: input.name,
      description: input.description,
      private: false,
      auto_init: true,
      has_wiki: false,
    });
  }

  async getBranchHead(owner: string, repo: string, branch: string): Promise<BranchHead | undefined> {
    const ref = await this.requestOptional("GET", `/repos/${owner}/${repo}/git/ref/heads/${branch}`, RefSchema);
    if (!ref) {
      return undefined;
    }
    const commit = await this.request("GET", `/repos/${owner}/${repo}/git/commits/${ref.object.sha}`, CommitSchema);
    return { commitSha: commit.sha, treeSha: commit.tree.sha };
  }

  // Blob sha of a file on the branch, or undefined when the file is absent.
  async getFileSha(owner: string, repo: string, path: string, branch: string) {
    const found = await this.requestOptional(
      "GET",
      `/repos/${owner}/${repo}/contents/${path}?ref=${encodeURIComponent(branch)}`,
      ShaSchema
    );
    return found?.sha;
  }

  async createBlob(owner: string, repo: string, content: string) {
    const blob = await this.request("POST", `/repos/${owner}/${repo}/git/blobs`, ShaSchema, {
      content,
      encoding: "utf-8",
    });
    return blob.sha;
  }

  // Without a base tree: the entries are the whole tree, so paths left out are deleted.
  async createTree(owner: string, repo: string, tree: TreeEntry[]) {
    const created = await this.request("POST", `/repos/${owner}/${repo}/git/trees`, ShaSchema, { tree });
    return created.sha;
  }

  async createCommit(owner: string, repo: string, input: { message: string; tree: string; parents: string[] }) {
    const commit = await this.request("POST", `/repos/${owner}/${repo}/git/commits`, ShaSchema, input);
    return commit.sha;
  }

  async updateBranch(owner: string, repo: string, branch: string, sha: string) {
    await this.request("PATCH", `/repos/${owner}/${repo}/git/refs/heads/${branch}`, AnySchema, { sha, force: false });
  }

  async createBranch(owner: string, repo: string, branch: string, sha: string) {
    await this.request("POST", `/repos/${owner}/${repo}/git/refs`, AnySchema, { ref: `refs/heads/${branch}`, sha });
  }

  // 409 means a Pages site already exists for the repository.
  async ensurePagesSite(owner: string, repo: string, branch: string) {
    const existing = await this.requestOptional("GET", `/repos/${owner}/${repo}/pages`, AnySchema);
    if (existing !== undefined) {
      return;
    }

    try {
      await this.request("POST", `/repos/${owner}/${repo}/pages`, AnySchema, {
        source: { branch, path: "/" },
      });
    } catch (err) {
      if (err instanceof UpstreamHttpError && err.status === 409) {
        return;
      }
      throw err;
    }
  }

  // Undefined until the first build has been queued.
  async getLatestPagesBuild(owner: string, repo: string): Promise<PagesBuild | undefined> {
    return this.requestOptional("GET", `/repos/${owner}/${repo}/pages/builds/latest`, PagesBuildSchema);
  }

  private async requestOptional<T>(method: string, path: string, schema: z.ZodType<T>): Promise<T | undefined> {
    try {
      return await this.request(method, path, schema);
    } catch (err) {
      if (err instanceof UpstreamHttpError && err.status === 404) {
        return undefined;
      }
      throw err;
    }
  }

  private async request<T>(method: string, path: string, schema: z.ZodType<T>, body?: unknown): Promise<T> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: {
        Accept: "application/vnd.github+json",
        Authorization: `Bearer ${this.token}`,
        "Content-Type": "application/json",
        "X-GitHub-Api-Version": "2022-11-28",
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: this.signal,
    });

    const text = await response.text();

    if (!response.ok) {
      throw new UpstreamHttpError(
        response.status,
        `GitHub API ${method} ${path} failed with ${response.status}: ${text || response.statusText}`
      );
    }

    const json: unknown = text ? JSON.parse(text) : undefined;
    return schema.parse(json);
  }
}
