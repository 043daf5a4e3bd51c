import {
  BundleRefSchema,
  CodeBundleSchema,
  ProjectIdSchema,
  RoundSchema,
} from "@pagesmith/shared";
import type { BundleRef, CodeBundle, Round } from "@pagesmith/shared";
import { InvariantViolation, RoundNotFoundError } from "./errors";
import {
  canonicalJson,
  ensureDir,
  listDirEntries,
  readJsonIfExists,
  sha256Hex,
  writeJsonAtomic,
} from "./jsonFileStorage";
import { assertCanMoveRound, isTerminalStatus } from "./roundTransitions";
import {
  PublicationLedgerSchema,
  PublicationRecordSchema,
  StoredBundleSchema,
  projectPaths,
} from "./rounds.schemas";
import type { PublicationRecord } from "./rounds.schemas";

/**
 * Durable record of every round, its generated bundle and what was published from it.
 * Once a round is completed or failed its record is append-only.
 */
export interface ArtifactStore {
  save(round: Round): Promise<Round>;
  load(projectId: string, roundNumber: number): Promise<Round>;
  list(projectId: string): Promise<Round[]>;

  writeBundle(projectId: string, roundNumber: number, bundle: CodeBundle): Promise<BundleRef>;
  readBundle(ref: BundleRef): Promise<CodeBundle>;

  // Only the latest publication on a target is live; older records never match.
  findPublication(projectId: string, target: string, bundleSha256: string): Promise<PublicationRecord | undefined>;
  recordPublication(projectId: string, record: PublicationRecord): Promise<void>;
}

// Rules every save must satisfy, given what is already on disk.
export function assertSavable(previous: Round | undefined, next: Round, predecessor?: Round) {
  if (!previous) {
    if (next.status !== "pending") {
      throw new InvariantViolation(
        `Round ${next.project_id} #${next.round_number} must be created as pending, got ${next.status}.`
      );
    }
    if (next.round_number > 1) {
      if (!predecessor) {
        throw new InvariantViolation(
          `Round ${next.project_id} #${next.round_number} would leave a gap: round ${next.round_number - 1} does not exist.`
        );
      }
      if (!isTerminalStatus(predecessor.status)) {
        throw new InvariantViolation(
          `Round ${next.project_id} #${next.round_number} cannot start while round ${predecessor.round_number} is ${predecessor.status}.`
        );
      }
    }
    return;
  }

  if (isTerminalStatus(previous.status)) {
    throw new InvariantViolation(
      `Round ${previous.project_id} #${previous.round_number} is ${previous.status} and cannot be modified.`
    );
  }

  assertCanMoveRound(previous.status, next.status);

  if (previous.published_target !== null && next.published_target !== previous.published_target) {
    throw new InvariantViolation(
      `Round ${previous.project_id} #${previous.round_number} already published to ${previous.published_target}.`
    );
  }

  if (previous.bundle !== null && next.bundle?.sha256 !== previous.bundle.sha256) {
    throw new InvariantViolation(
      `Round ${previous.project_id} #${previous.round_number} already has bundle ${previous.bundle.bundle_id}.`
    );
  }
}

function parseBundleId(bundleId: string) {
  const match = /^(.+)\/(\d+)$/.exec(bundleId);
  if (!match) {
    throw new InvariantViolation(`Malformed bundle id: ${bundleId}`);
  }
  return { projectId: ProjectIdSchema.parse(match[1]), roundNumber: Number(match[2]) };
}

export function bundleIdFor(projectId: string, roundNumber: number) {
  return `${projectId}/${roundNumber}`;
}

/**
 * Filesystem implementation. Every file lives under one project's folder,
 * so rounds of different projects never write the same path.
 */
export class FileArtifactStore implements ArtifactStore {
  private readonly dataDir: string;

  constructor(opts: { dataDir: string }) {
    this.dataDir = opts.dataDir;
  }

  async save(round: Round): Promise<Round> {
    const paths = projectPaths(this.dataDir, round.project_id);
    const previous = await readJsonIfExists(paths.round(round.round_number), RoundSchema);
    const predecessor =
      !previous && round.round_number > 1
        ? await readJsonIfExists(paths.round(round.round_number - 1), RoundSchema)
        : undefined;

    const validated = RoundSchema.parse({
      ...round,
      last_updated_at: new Date().toISOString(),
    });
    assertSavable(previous, validated, predecessor);

    await ensureDir(paths.roundsDir);
    await writeJsonAtomic(paths.round(validated.round_number), validated);
    return validated;
  }

  async load(projectId: string, roundNumber: number): Promise<Round> {
    const round = await readJsonIfExists(projectPaths(this.dataDir, projectId).round(roundNumber), RoundSchema);
    if (!round) {
      throw new RoundNotFoundError(projectId, roundNumber);
    }
    return round;
  }

  async list(projectId: string): Promise<Round[]> {
    const paths = projectPaths(this.dataDir, projectId);
    const numbers = (await listDirEntries(paths.roundsDir))
      .map((entry) => /^(\d+)\.json$/.exec(entry))
      .filter((match): match is RegExpExecArray => match !== null)
      .map((match) => Number(match[1]))
      .sort((a, b) => a - b);

    return Promise.all(numbers.map((roundNumber) => this.load(projectId, roundNumber)));
  }

  async writeBundle(projectId: string, roundNumber: number, bundle: CodeBundle): Promise<BundleRef> {
    const validated = CodeBundleSchema.parse(bundle);
    const paths = projectPaths(this.dataDir, projectId);

    const ref = BundleRefSchema.parse({
      bundle_id: bundleIdFor(projectId, roundNumber),
      sha256: sha256Hex(canonicalJson(validated.files)),
      file_count: Object.keys(validated.files).length,
      created_at: new Date().toISOString(),
    });

    await ensureDir(paths.bundlesDir);
    await writeJsonAtomic(paths.bundle(roundNumber), StoredBundleSchema.parse({ ref, bundle: validated }));
    return ref;
  }

  async readBundle(ref: BundleRef): Promise<CodeBundle> {
    const { projectId, roundNumber } = parseBundleId(ref.bundle_id);
    const stored = await readJsonIfExists(projectPaths(this.dataDir, projectId).bundle(roundNumber), StoredBundleSchema);

    if (!stored) {
      throw new InvariantViolation(`Bundle ${ref.bundle_id} is referenced but missing from the store.`);
    }
    if (sha256Hex(canonicalJson(stored.bundle.files)) !== ref.sha256) {
      throw new InvariantViolation(`Bundle ${ref.bundle_id} does not match its recorded sha256.`);
    }
    return stored.bundle;
  }

  async findPublication(projectId: string, target: string, bundleSha256: string) {
    const ledger = await this.readLedger(projectId);
    const live = ledger.publications.filter((record) => record.target === target).at(-1);
    return live?.bundle_sha256 === bundleSha256 ? live : undefined;
  }

  async recordPublication(projectId: string, record: PublicationRecord): Promise<void> {
    const ledger = await this.readLedger(projectId);
    const validated = PublicationRecordSchema.parse(record);
    const publications = [
      ...ledger.publications.filter(
        (existing) => !(existing.target === validated.target && existing.bundle_sha256 === validated.bundle_sha256)
      ),
      validated,
    ];

    const paths = projectPaths(this.dataDir, projectId);
    await ensureDir(paths.root);
    await writeJsonAtomic(
      paths.publications,
      PublicationLedgerSchema.parse({ version: 1, project_id: projectId, publications })
    );
  }

  private async readLedger(projectId: string) {
    const existing = await readJsonIfExists(
      projectPaths(this.dataDir, projectId).publications,
      PublicationLedgerSchema
    );
    return existing ?? PublicationLedgerSchema.parse({ version: 1, project_id: projectId, publications: [] });
  }
}
