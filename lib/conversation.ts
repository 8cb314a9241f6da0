/**
 * The /update conversation: select project -> actual % -> planned %.
 *
 * `advance` is the only entry point. It takes the chat's current state and
 * one event, talks to the row store when the step needs it, and returns the
 * next state with the reply to send. Events a state does not accept leave the
 * state as it is and produce no reply.
 */

import { CollaboratorError, ValidationError, describeError } from "./errors";
import { buildProjectKeyboard } from "./menu";
import { COLUMNS, HEADER_ROWS, NOW_FORMULA, type RowStore } from "./sheets";
import { escapeHtml } from "./status";
import type { TgInlineKeyboardMarkup } from "./telegram";

export type ConversationState =
  | { step: "IDLE" }
  | { step: "SELECT_PROJECT"; projects: string[] }
  | { step: "INPUT_ACTUAL"; row: number }
  | { step: "INPUT_PLANNED"; row: number; actual: number };

export type ConversationEvent =
  | { type: "START" }
  | { type: "SELECT"; index: number }
  | { type: "TEXT"; text: string }
  | { type: "CANCEL" };

export type Reply = {
  text: string;
  keyboard?: TgInlineKeyboardMarkup;
  html?: boolean;
  /** Errors go out as a fresh message even when a button triggered them. */
  isError?: boolean;
};

export type Transition = {
  state: ConversationState;
  reply?: Reply;
  /** Collaborator failure that ended the conversation, for logging. */
  error?: CollaboratorError;
};

export const IDLE: ConversationState = { step: "IDLE" };

export const SELECT_PROMPT = "🔧 Select project to update:";
export const ACTUAL_PROMPT = "Enter new ACTUAL progress (0% - 100%):";
export const PLANNED_PROMPT = "Enter new PLANNED progress (0% - 100%):";
export const INVALID_VALUE_TEXT =
  "❌ Invalid value! Must be number between 0 and 100\nTry again:";
export const CANCELED_TEXT = "⚠️ Update canceled.";
export const NO_PROJECTS_TO_UPDATE = "📭 No projects to update.";
export const UNKNOWN_PROJECT_TEXT =
  "❌ Unknown project. Pick one from the list above.";

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parse a percentage in [0, 100]. Throws ValidationError otherwise.
 */
export function parsePercent(text: string): number {
  const trimmed = text.trim();
  if (!DECIMAL.test(trimmed)) {
    throw new ValidationError(`not a number: "${trimmed}"`);
  }
  const value = Number(trimmed);
  if (!(value >= 0 && value <= 100)) {
    throw new ValidationError(`out of range: ${value}`);
  }
  return value;
}

/**
 * Both values as percentages.
 */
export function successText(name: string, actual: number, planned: number): string {
  return [
    `✅ Successfully updated <b>${escapeHtml(name)}</b>:`,
    `- New Actual: ${actual.toFixed(1)}%`,
    `- New Planned: ${planned.toFixed(1)}%`,
  ].join("\n");
}

function errorReply(text: string): Reply {
  return { text, isError: true };
}

function asCollaboratorError(operation: string, err: unknown): CollaboratorError {
  return err instanceof CollaboratorError
    ? err
    : new CollaboratorError(operation, err);
}

async function start(store: RowStore): Promise<Transition> {
  let projects: string[];
  try {
    projects = await store.getProjectNames();
  } catch (err) {
    return {
      state: IDLE,
      reply: errorReply(`❌ Error: ${describeError(err)}`),
      error: asCollaboratorError("sheets.getProjectNames", err),
    };
  }
  if (!projects.length) {
    return { state: IDLE, reply: { text: NO_PROJECTS_TO_UPDATE } };
  }
  return {
    state: { step: "SELECT_PROJECT", projects },
    reply: { text: SELECT_PROMPT, keyboard: buildProjectKeyboard(projects) },
  };
}

function select(
  state: Extract<ConversationState, { step: "SELECT_PROJECT" }>,
  index: number,
): Transition {
  if (!Number.isInteger(index) || index < 1 || index > state.projects.length) {
    return { state, reply: errorReply(UNKNOWN_PROJECT_TEXT) };
  }
  return {
    state: { step: "INPUT_ACTUAL", row: index + HEADER_ROWS },
    reply: { text: ACTUAL_PROMPT },
  };
}

function inputActual(
  state: Extract<ConversationState, { step: "INPUT_ACTUAL" }>,
  text: string,
): Transition {
  let value: number;
  try {
    value = parsePercent(text);
  } catch (err) {
    if (err instanceof ValidationError) {
      return { state, reply: { text: INVALID_VALUE_TEXT } };
    }
    throw err;
  }
  return {
    state: { step: "INPUT_PLANNED", row: state.row, actual: value / 100 },
    reply: { text: PLANNED_PROMPT },
  };
}

async function inputPlanned(
  state: Extract<ConversationState, { step: "INPUT_PLANNED" }>,
  text: string,
  store: RowStore,
): Promise<Transition> {
  let value: number;
  try {
    value = parsePercent(text);
  } catch (err) {
    if (err instanceof ValidationError) {
      return { state, reply: { text: INVALID_VALUE_TEXT } };
    }
    throw err;
  }

  const planned = value / 100;
  try {
    // Three separate writes; a failure part-way leaves the row half-updated.
    await store.updateCell(state.row, COLUMNS.actual, state.actual);
    await store.updateCell(state.row, COLUMNS.planned, planned);
    await store.updateCell(state.row, COLUMNS.updateProgress, NOW_FORMULA);
    const name = await store.getCell(state.row, COLUMNS.projectName);
    return {
      state: IDLE,
      reply: {
        text: successText(name, state.actual * 100, value),
        html: true,
      },
    };
  } catch (err) {
    return {
      state: IDLE,
      reply: errorReply(`❌ Update failed: ${describeError(err)}`),
      error: asCollaboratorError("sheets.writeProgress", err),
    };
  }
}

export async function advance(
  state: ConversationState,
  event: ConversationEvent,
  store: RowStore,
): Promise<Transition> {
  switch (event.type) {
    case "CANCEL":
      return { state: IDLE, reply: { text: CANCELED_TEXT } };
    case "START":
      return start(store);
    case "SELECT":
      return state.step === "SELECT_PROJECT"
        ? select(state, event.index)
        : { state };
    case "TEXT":
      if (state.step === "INPUT_ACTUAL") return inputActual(state, event.text);
      if (state.step === "INPUT_PLANNED") {
        return inputPlanned(state, event.text, store);
      }
      return { state };
  }
}
