/**
 * Call greetings and closing lines
 */

import type { Contact } from "./types.js";

export type TimeOfDay = "morning" | "afternoon" | "evening" | "night";

const CONTACT_GREETINGS: Record<TimeOfDay, string[]> = {
  morning: [
    "Good morning {caller}! {owner} is currently unavailable. How may I help you?",
    "Hello {caller}, good morning! {owner} can't take your call right now.",
  ],
  afternoon: [
    "Good afternoon {caller}! {owner} is busy at the moment. How can I assist?",
    "Hello {caller}! {owner} isn't available right now. What can I do for you?",
  ],
  evening: [
    "Good evening {caller}! {owner} is unavailable. How may I help?",
    "Hello {caller}, good evening! {owner} can't answer right now.",
  ],
  night: [
    "Hello {caller}! {owner} is resting now. Is this urgent?",
    "Hello {caller}! {owner} is unavailable at this hour.",
  ],
};

const UNKNOWN_CALLER_GREETINGS = [
  "Hello! You've reached {owner}. They're unavailable right now. Please leave your name and message.",
  "Hello! This is {owner}'s assistant. They're unavailable. How can I help?",
  "Hi there! {owner} can't take your call. Would you like to leave a message?",
];

const FOLLOW_UPS = [
  "I'm still here. How can I help you?",
  "Are you there? Please let me know how I can assist.",
  "I didn't catch that. Could you please repeat?",
];

export const SILENCE_CLOSING = "I didn't hear anything. Please call back later. Goodbye!";

export function timeOfDay(at: Date): TimeOfDay {
  const hour = at.getHours();
  if (hour >= 5 && hour < 12) return "morning";
  if (hour >= 12 && hour < 17) return "afternoon";
  if (hour >= 17 && hour < 21) return "evening";
  return "night";
}

function pick(templates: readonly string[], random: () => number): string {
  const index = Math.min(Math.floor(random() * templates.length), templates.length - 1);
  return templates[index] ?? templates[0] ?? "";
}

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export function findContact(contacts: readonly Contact[], number: string): Contact | undefined {
  const normalized = normalizeNumber(number);
  return contacts.find((c) => normalizeNumber(c.number) === normalized);
}

function normalizeNumber(number: string): string {
  return number.replace(/[^\d+]/g, "");
}

export interface GreetingInput {
  ownerName: string;
  /** Known contact name, if the caller is in the contact list */
  contactName?: string;
  at: Date;
  random?: () => number;
}

/** Personal greeting for known contacts, a professional one otherwise */
export function buildGreeting(input: GreetingInput): string {
  const random = input.random ?? Math.random;
  if (input.contactName) {
    return fill(pick(CONTACT_GREETINGS[timeOfDay(input.at)], random), {
      caller: input.contactName,
      owner: input.ownerName,
    });
  }
  return fill(pick(UNKNOWN_CALLER_GREETINGS, random), { owner: input.ownerName });
}

export function buildFollowUp(random: () => number = Math.random): string {
  return pick(FOLLOW_UPS, random);
}

export function buildClosing(ownerName: string, urgent: boolean): string {
  return urgent
    ? `I'll make sure ${ownerName} gets this message urgently. Goodbye!`
    : `Thank you for calling. I'll pass your message to ${ownerName}. Goodbye!`;
}
