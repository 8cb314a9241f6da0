/**
 * Static menu, help text and inline keyboards.
 *
 * Exports:
 * - BOT_COMMANDS: command list registered with setMyCommands
 * - MENU_CALLBACKS: callback_data of the start menu buttons
 * - buildStartMenu(): InlineKeyboardMarkup (one command per row)
 * - buildProjectKeyboard(names): InlineKeyboardMarkup ("<i>. <name>", data "<i>")
 * - parseProjectIndex(data): 1-based display index or undefined
 */

import type { TgBotCommand, TgInlineKeyboardMarkup } from "./telegram";

export const BOT_COMMANDS: TgBotCommand[] = [
  { command: "start", description: "Show the main menu" },
  { command: "update", description: "Update a project's progress" },
  { command: "list", description: "Show all project statuses" },
  { command: "help", description: "How to use this bot" },
  { command: "cancel", description: "Cancel the current update" },
  { command: "ping", description: "Check the bot is alive" },
];

export const MENU_CALLBACKS = {
  start: "cmd_start",
  update: "cmd_update",
  list: "cmd_list",
  help: "cmd_help",
} as const;

export type MenuCommand = keyof typeof MENU_CALLBACKS;

const MENU_ORDER: readonly MenuCommand[] = ["start", "update", "list", "help"];

export const START_TEXT = "🏗️ Project Progress Tracker Bot\n\nChoose a command:";

export const HELP_TEXT = [
  "🤖 Bot Guide:",
  "",
  "/start - Initialize the bot",
  "/list - Show all project statuses",
  "/update - Modify progress values",
  "/cancel - Stop an update in progress",
  "/ping - Check the bot is alive",
  "",
  "When updating:",
  "1. Select a project",
  "2. Enter ACTUAL progress (0%-100%)",
  "3. Enter PLANNED progress (0%-100%)",
  "",
  "Note: Values must be numbers between 0 and 100",
].join("\n");

export const PONG_TEXT = "🏓 Pong! Bot is alive.";

export function buildStartMenu(): TgInlineKeyboardMarkup {
  return {
    inline_keyboard: MENU_ORDER.map((cmd) => [
      { text: `/${cmd}`, callback_data: MENU_CALLBACKS[cmd] },
    ]),
  };
}

/**
 * Map callback_data back to the menu command it stands for.
 */
export function menuCommandFor(data: string): MenuCommand | undefined {
  return MENU_ORDER.find((cmd) => MENU_CALLBACKS[cmd] === data);
}

/**
 * One project per row, numbered from 1 in sheet order.
 */
export function buildProjectKeyboard(
  names: readonly string[],
): TgInlineKeyboardMarkup {
  return {
    inline_keyboard: names.map((name, i) => [
      { text: `${i + 1}. ${name}`, callback_data: String(i + 1) },
    ]),
  };
}

export function parseProjectIndex(data: string): number | undefined {
  if (!/^\d+$/.test(data)) return undefined;
  const idx = Number(data);
  return Number.isSafeInteger(idx) ? idx : undefined;
}
