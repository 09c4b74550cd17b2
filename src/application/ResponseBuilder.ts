import type { Decision } from '../domain/entities/Decision.js';
import type { Field } from '../domain/entities/Field.js';
import type { AbstractOutput, AskOutput, TellOutput } from '../domain/entities/Output.js';

export interface ResponseBuilderConfig {
  /** Spoken in the welcome prompt, e.g. "Welcome to the office" */
  officeName: string;
  /** Title of the summary card sent with the confirmation */
  cardTitle: string;
}

export const FIELD_PROMPTS: Readonly<Record<Field, string>> = {
  recipient: 'Who are you here to see?',
  requester: "What's your name?",
};

export const CLARIFICATION_PROMPT =
  "Sorry, I didn't understand that, please say your name or who you're here to visit.";

export const HELP_PROMPT =
  "I can send a message to anybody in the office. Just tell me your name and who you're here to see" +
  " in a form like, I'm Bob here to see Kevin. " +
  FIELD_PROMPTS.recipient;

export const GOODBYE_TEXT = 'Goodbye';

/**
 * Turns resolver decisions and canned triggers into rendering-independent output
 */
export class ResponseBuilder {
  constructor(private readonly config: ResponseBuilderConfig) {}

  build(decision: Decision): AbstractOutput {
    switch (decision.type) {
      case 'need_field':
        return this.ask(FIELD_PROMPTS[decision.field]);
      case 'complete':
        return this.confirmation(decision.recipient, decision.requester);
      case 'unintelligible':
        return this.ask(CLARIFICATION_PROMPT);
    }
  }

  welcome(): AskOutput {
    return this.ask(
      `Welcome to ${this.config.officeName}, who are you here to see? I can send them a message for you`,
      "I can help send a message to whoever you're here to see"
    );
  }

  help(): AskOutput {
    return this.ask(HELP_PROMPT, FIELD_PROMPTS.recipient);
  }

  goodbye(): TellOutput {
    return { type: 'tell', text: GOODBYE_TEXT };
  }

  private confirmation(recipient: string, requester: string): TellOutput {
    const text = `Ok, ${requester}, I just sent a message to ${recipient}, please have a seat and wait.`;
    return {
      type: 'tell',
      text,
      card: { title: this.config.cardTitle, body: text },
    };
  }

  /**
   * Plain-text ask; the reprompt repeats the prompt unless given
   */
  private ask(prompt: string, reprompt: string = prompt): AskOutput {
    return {
      type: 'ask',
      prompt,
      isPromptMarkup: false,
      reprompt,
      isRepromptMarkup: false,
    };
  }
}
