import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import { UpstreamHttpError, UpstreamRejectedError } from "@pagesmith/shared";
import type { PublicationBackend, PublishBundleInput, PublishBundleResult } from "@pagesmith/shared";
import { readNumberEnv } from "../providers/llmClient";
import { GitHubClient } from "./githubClient";
import type { BranchHead, GitHubRepository, TreeEntry } from "./githubClient";
import { LICENSE_FILE, mitLicense } from "./license";

const PAGES_TARGET = /^https:\/\/([A-Za-z0-9-]+)\.github\.io\/([A-Za-z0-9_.-]+)\/?$/;

export function pagesUrlFor(owner: string, repo: string) {
  return `https://${owner.toLowerCase()}.github.io/${repo}/`;
}

export function parsePagesTarget(target: string) {
  const match = PAGES_TARGET.exec(target);
  if (!match) {
    throw new UpstreamRejectedError(`Target is not a GitHub Pages URL: ${target}`);
  }
  return { owner: match[1], repo: match[2] };
}

export function commitMessageFor(roundNumber: number, instruction: string) {
  const summary = instruction.split("\n")[0].trim().slice(0, 72);
  return `Round ${roundNumber}: ${summary}`;
}

export type GitHubClientFactory = (signal: AbortSignal) => GitHubClient;

export type PagesBuildPolling = {
  attempts: number;
  intervalMs: number;
};

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export function readPagesBuildPolling(): PagesBuildPolling {
  return {
    attempts: Math.max(1, readNumberEnv("GITHUB_PAGES_POLL_ATTEMPTS", 10)),
    intervalMs: Math.max(0, readNumberEnv("GITHUB_PAGES_POLL_INTERVAL_MS", 5_000)),
  };
}

const sleepFor: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

type Target = {
  owner: string;
  repo: string;
};

/**
 * Publishes a bundle as a GitHub Pages site. The first round creates a public
 * repository named after the project; later rounds push to the repository behind the target.
 * Each commit replaces the whole tree, and publish resolves only once Pages has built that commit.
 */
export class GitHubPagesPublicationBackend implements PublicationBackend {
  private readonly logger: Logger;
  private readonly clientFor: GitHubClientFactory;
  private readonly polling?: PagesBuildPolling;
  private readonly sleep: Sleep;

  constructor(opts: { logger: Logger; clientFor?: GitHubClientFactory; polling?: PagesBuildPolling; sleep?: Sleep }) {
    this.logger = opts.logger;
    this.clientFor = opts.clientFor ?? ((signal) => new GitHubClient({ signal }));
    this.polling = opts.polling;
    this.sleep = opts.sleep ?? sleepFor;
  }

  async publish(input: PublishBundleInput): Promise<PublishBundleResult> {
    const client = this.clientFor(input.signal);
    const logger = this.logger.child({ project_id: input.projectId, round_number: input.roundNumber });

    const { owner, repo }: Target = input.target
      ? parsePagesTarget(input.target)
      : { owner: process.env.GITHUB_OWNER || (await client.getAuthenticatedLogin()), repo: input.projectId };

    let repository = await client.findRepository(owner, repo);
    if (!repository) {
      if (input.target) {
        throw new UpstreamRejectedError(`Repository ${owner}/${repo} behind ${input.target} no longer exists.`);
      }
      repository = await client.createRepository({
        name: repo,
        description: `Static site generated for project ${input.projectId}.`,
      });
      logger.info({ repository: repository.full_name }, "repository created");
    }

    const branch = repository.default_branch;
    const head = await client.getBranchHead(owner, repo, branch);
    const entries = await this.treeEntries(client, { owner, repo }, repository, branch, head, input);
    const tree = await client.createTree(owner, repo, entries);

    let commitSha: string;
    if (head && tree === head.treeSha) {
      commitSha = head.commitSha;
      logger.info({ commit_sha: commitSha }, "tree unchanged; skipping commit");
    } else {
      commitSha = await client.createCommit(owner, repo, {
        message: commitMessageFor(input.roundNumber, input.instruction),
        tree,
        parents: head ? [head.commitSha] : [],
      });
      if (head) {
        await client.updateBranch(owner, repo, branch, commitSha);
      } else {
        await client.createBranch(owner, repo, branch, commitSha);
      }
      logger.info({ commit_sha: commitSha, files: entries.length }, "bundle committed");
    }

    await client.ensurePagesSite(owner, repo, branch);
    await this.waitForBuild(client, { owner, repo }, commitSha, input.signal, logger);

    return {
      target: pagesUrlFor(owner, repo),
      repository_url: repository.html_url,
      commit_sha: commitSha,
    };
  }

  // The bundle's files plus a LICENSE: the one already on the branch when there is one, else a fresh MIT text.
  private async treeEntries(
    client: GitHubClient,
    { owner, repo }: Target,
    repository: GitHubRepository,
    branch: string,
    head: BranchHead | undefined,
    input: PublishBundleInput
  ): Promise<TreeEntry[]> {
    const files: Record<string, string> = { ...input.bundle.files };
    const entries: TreeEntry[] = [];

    if (!(LICENSE_FILE in files)) {
      const existing = head ? await client.getFileSha(owner, repo, LICENSE_FILE, branch) : undefined;
      if (existing) {
        entries.push({ path: LICENSE_FILE, mode: "100644", type: "blob", sha: existing });
      } else {
        files[LICENSE_FILE] = mitLicense(new Date().getFullYear(), repository.owner.login);
      }
    }

    for (const path of Object.keys(files).sort()) {
      entries.push({ path, mode: "100644", type: "blob", sha: await client.createBlob(owner, repo, files[path]) });
    }
    return entries;
  }

  // Pages serves a commit once its latest build reports "built" for that sha.
  private async waitForBuild(
    client: GitHubClient,
    { owner, repo }: Target,
    commitSha: string,
    signal: AbortSignal,
    logger: Logger
  ) {
    const polling = this.polling ?? readPagesBuildPolling();

    for (let check = 1; check <= polling.attempts; check += 1) {
      const build = await client.getLatestPagesBuild(owner, repo);
      if (build?.commit === commitSha) {
        if (build.status === "built") {
          logger.info({ commit_sha: commitSha, checks: check }, "pages build live");
          return;
        }
        if (build.status === "errored") {
          throw new UpstreamRejectedError(
            `GitHub Pages build of ${commitSha} failed: ${build.error?.message ?? "no detail given"}`
          );
        }
      }
      if (check < polling.attempts) {
        await this.sleep(polling.intervalMs, signal);
      }
    }

    throw new UpstreamHttpError(
      503,
      `GitHub Pages had not built ${commitSha} for ${owner}/${repo} after ${polling.attempts} checks.`
    );
  }
}
