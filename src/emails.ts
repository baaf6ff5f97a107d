import { JsonObject, JsonValue, isJsonObject } from './json';

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/i;
const EMAIL_IN_TEXT = /[^@\s]+@[^@\s]+\.[^@\s]+/gi;

const PEOPLE_COLLECTIONS = ['signers', 'recipients', 'participants'] as const;

export interface EmailSources {
  summary: JsonObject;
  detail?: JsonObject;
}

/** Returns candidate addresses in discovery order; an empty list means "no opinion". */
export type EmailStrategy = (sources: EmailSources) => string[];

class EmailSet {
  private readonly seen: string[] = [];

  add(candidate: JsonValue | undefined): void {
    if (typeof candidate !== 'string') return;
    const email = candidate.trim();
    if (EMAIL_PATTERN.test(email) && !this.seen.includes(email)) {
      this.seen.push(email);
    }
  }

  toArray(): string[] {
    return [...this.seen];
  }
}

export function harvestStructured(container: JsonObject): string[] {
  const emails = new EmailSet();
  for (const key of PEOPLE_COLLECTIONS) {
    const items = container[key];
    if (!Array.isArray(items)) continue;
    for (const item of items) {
      if (!isJsonObject(item)) continue;
      emails.add(item.email);
      const user = item.user;
      if (isJsonObject(user)) emails.add(user.email);
    }
  }
  return emails.toArray();
}

export function harvestDeep(value: JsonValue): string[] {
  const emails = new EmailSet();
  const walk = (node: JsonValue): void => {
    if (typeof node === 'string') {
      for (const match of node.match(EMAIL_IN_TEXT) ?? []) emails.add(match);
    } else if (Array.isArray(node)) {
      node.forEach(walk);
    } else if (isJsonObject(node)) {
      Object.values(node).forEach(walk);
    }
  };
  walk(value);
  return emails.toArray();
}

export const EMAIL_STRATEGIES: readonly EmailStrategy[] = [
  ({ detail }) => (detail ? harvestStructured(detail) : []),
  ({ summary }) => harvestStructured(summary),
  ({ detail }) => (detail ? harvestDeep(detail) : []),
  ({ summary }) => harvestDeep(summary),
];

export function extractEmails(
  summary: JsonObject,
  detail?: JsonObject,
  strategies: readonly EmailStrategy[] = EMAIL_STRATEGIES
): string[] {
  for (const strategy of strategies) {
    const found = strategy({ summary, detail });
    if (found.length > 0) return found;
  }
  return [];
}
