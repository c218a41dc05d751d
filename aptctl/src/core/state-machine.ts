import type { PublishToggles } from "../types/config.js";

/**
 * All pipeline stages in order. Each consumes the byte-exact output of the
 * one before it.
 */
export const ALL_STAGES = [
  "building",
  "index_generating",
  "release_generating",
  "signing",
  "publishing",
] as const;

export type PublishStage = (typeof ALL_STAGES)[number];

export type PublishState = "idle" | PublishStage | "done" | "failed";

/**
 * Events that drive state transitions. `declined` is the operator answering
 * no to the publish prompt.
 */
export type TransitionEvent = "start" | "success" | "failure" | "declined";

export type StageToggles = Pick<PublishToggles, "build" | "install">;

/**
 * Stage list after skip rules: no building with the build toggle off, no
 * publishing with the install toggle off.
 */
export function getEffectiveStages(toggles: StageToggles): PublishStage[] {
  return ALL_STAGES.filter((s) => {
    if (s === "building") return toggles.build;
    if (s === "publishing") return toggles.install;
    return true;
  });
}

export function isTerminal(state: PublishState): state is "done" | "failed" {
  return state === "done" || state === "failed";
}

/**
 * Pure function: given current state + event, return next state. Terminal
 * states never move.
 */
export function nextState(current: PublishState, event: TransitionEvent, toggles: StageToggles): PublishState {
  if (isTerminal(current)) return current;
  if (event === "failure") return "failed";

  const effective = getEffectiveStages(toggles);

  if (current === "idle") {
    if (event !== "start") return "idle";
    return effective[0] ?? "done";
  }

  const idx = effective.indexOf(current);
  if (idx === -1) return "failed";

  const next = effective[idx + 1];
  if (next === undefined) return "done";
  if (event === "declined" && next === "publishing") return effective[idx + 2] ?? "done";
  return next;
}
