import type { ChatMessage, ContentPart } from '../types/message.js';

const PLACEHOLDER = /<secret>([^<]+)<\/secret>/g;

export function placeholderFor(name: string): string {
  return `<secret>${name}</secret>`;
}

/**
 * Swaps configured secret values for stable `<secret>name</secret>`
 * placeholders on the way to the reasoner, and back on the way to the page.
 */
export class SensitiveDataFilter {
  private readonly entries: [name: string, value: string][];
  private readonly byName: Map<string, string>;

  constructor(secrets: Record<string, string> = {}) {
    this.entries = Object.entries(secrets)
      .filter(([, value]) => value !== '')
      // Longest first so a secret containing another is masked whole.
      .sort(([, a], [, b]) => b.length - a.length);
    this.byName = new Map(this.entries);
  }

  get names(): string[] {
    return this.entries.map(([name]) => name);
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  mask(text: string): string {
    let out = text;
    for (const [name, value] of this.entries) {
      out = out.split(value).join(placeholderFor(name));
    }
    return out;
  }

  maskMessage(message: ChatMessage): ChatMessage {
    if (this.isEmpty) return message;
    if (typeof message.content === 'string') {
      return { ...message, content: this.mask(message.content) };
    }
    const content: ContentPart[] = message.content.map((part) =>
      part.type === 'text' ? { type: 'text', text: this.mask(part.text) } : part,
    );
    return { ...message, content };
  }

  /** Replace placeholders inside any JSON-like value. Unknown names stay as they are. */
  reveal(value: unknown): unknown {
    if (typeof value === 'string') {
      return value.replace(PLACEHOLDER, (match, name: string) => this.byName.get(name) ?? match);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.reveal(item));
    }
    if (value !== null && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.reveal(item);
      }
      return result;
    }
    return value;
  }
}
