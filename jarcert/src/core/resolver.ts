import {
  checkForUpdates,
  describe,
  sameArtifact,
  update,
  type Artifact,
  type ResolverContext,
} from "../artifacts/artifact.js";
import {
  CorruptSignatureError,
  ResolutionFailedError,
  ResolutionUnsettledError,
  formatError,
  isCacheInvalidation,
  type CacheInvalidationError,
} from "../errors.js";
import { nextState, type ResolutionEvent, type ResolutionState } from "./state-machine.js";

/** Upper bound on validate/update rounds; a well-behaved catalog needs at most three. */
const MAX_ROUNDS = 8;

export type UpdateReason =
  | { kind: "invalid"; error: CacheInvalidationError | CorruptSignatureError }
  | { kind: "forced" };

export type EnsureOptions = {
  /**
   * Refresh catalog answers. A development artifact is rechecked and goes
   * through the update hook, but is only recompiled when its cache is invalid.
   */
  force?: boolean;
  /** Switch to newer catalog builds when available. Defaults to true. */
  followUpdates?: boolean;
  /** Called before each download or build; rejecting aborts resolution. */
  beforeUpdate?: (artifact: Artifact, reason: UpdateReason) => Promise<void>;
};

export type Resolution = {
  artifact: Artifact;
  state: ResolutionState;
  /** Whether anything was downloaded or compiled. */
  updated: boolean;
  /** States passed through, in order. */
  history: ResolutionState[];
};

/**
 * Drive an artifact to a validated, usable state: validate, follow newer
 * builds, update when the cache is invalid, then validate once more. A cache
 * that is still invalid after its update is fatal.
 */
export async function ensureArtifact(
  initial: Artifact,
  ctx: ResolverContext,
  options: EnsureOptions = {},
): Promise<Resolution> {
  let artifact = initial;
  let updated = false;
  const trail: { state: ResolutionState; history: ResolutionState[] } = {
    state: "unresolved",
    history: ["unresolved"],
  };

  const move = (event: ResolutionEvent): void => {
    const to = nextState(trail.state, event);
    ctx.logger.debug("Resolver transition", { from: trail.state, event, to });
    trail.state = to;
    trail.history.push(to);
  };

  const runUpdate = async (target: Artifact, reason: UpdateReason): Promise<boolean> => {
    await options.beforeUpdate?.(target, reason);
    // a forced check leaves the decision to the cache; a known-bad cache is always replaced
    return update(target, ctx, { force: reason.kind === "invalid" });
  };

  move("start");
  for (let round = 0; round < MAX_ROUNDS; round++) {
    let next: Artifact | null;
    try {
      next = await checkForUpdates(artifact, ctx, {
        force: (options.force ?? false) && round === 0,
        ignoreUpdates: updated || options.followUpdates === false,
      });
    } catch (err) {
      if (!isCacheInvalidation(err) && !(err instanceof CorruptSignatureError)) throw err;
      if (updated) {
        if (isCacheInvalidation(err)) throw new ResolutionFailedError(await describe(artifact, ctx), err);
        throw err;
      }
      ctx.logger.debug("Cache invalid", { reason: formatError(err).join("\n") });
      move("cache_invalid");
      updated = (await runUpdate(artifact, { kind: "invalid", error: err })) || updated;
      move("updated");
      continue;
    }

    if (next === null) {
      move("cache_valid");
      move("finish");
      return { artifact, state: trail.state, updated, history: trail.history };
    }

    move("update_found");
    if (sameArtifact(next, artifact)) {
      updated = (await runUpdate(artifact, { kind: "forced" })) || updated;
      move("updated");
    } else {
      artifact = next;
      move("switched");
    }
  }

  throw new ResolutionUnsettledError(`Artifact did not settle after ${MAX_ROUNDS} rounds`, await describe(artifact, ctx));
}
