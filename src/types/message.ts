export enum Role {
  System = "system",
  User = "user"
}

export interface ChatMessage {
  role: Role;
  content: string;
}

export function systemMessage(content: string): ChatMessage {
  return { role: Role.System, content };
}

export function userMessage(content: string): ChatMessage {
  return { role: Role.User, content };
}
