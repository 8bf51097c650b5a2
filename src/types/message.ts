export type MessageRole = 'system' | 'user' | 'assistant';

export type MessageKind = 'system' | 'task' | 'history' | 'plan' | 'correction' | 'state';

export type ContentPart =
  | { type: 'text'; text: string }
  | { type: 'image'; mediaType: 'image/png'; data: string };

export interface ChatMessage {
  role: MessageRole;
  kind: MessageKind;
  content: string | ContentPart[];
}
