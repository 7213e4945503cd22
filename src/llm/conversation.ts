import { v4 as uuidv4 } from 'uuid';

export type MessageRole = 'user' | 'model';

export interface ConversationMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly stepName?: string;
  readonly timestamp: Date;
}

/** Append-only message log for one validation run. */
export class ConversationState {
  readonly id = uuidv4();
  private readonly log: ConversationMessage[] = [];

  get messages(): readonly ConversationMessage[] {
    return this.log;
  }

  get length(): number {
    return this.log.length;
  }

  addUserMessage(content: string, stepName?: string): ConversationMessage {
    return this.append('user', content, stepName);
  }

  addModelMessage(content: string, stepName?: string): ConversationMessage {
    return this.append('model', content, stepName);
  }

  formattedHistory(): string {
    return this.log.map((m) => `${m.role.toUpperCase()}: ${m.content}\n\n`).join('');
  }

  stepHistory(stepName: string): ConversationMessage[] {
    return this.log.filter((m) => m.stepName === undefined || m.stepName === stepName);
  }

  private append(role: MessageRole, content: string, stepName?: string): ConversationMessage {
    const message: ConversationMessage = Object.freeze({
      role,
      content,
      stepName,
      timestamp: new Date(),
    });
    this.log.push(message);
    return message;
  }
}
