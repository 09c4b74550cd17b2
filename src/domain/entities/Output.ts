/**
 * Summary card shown on display-capable devices
 */
export interface Card {
  title: string;
  body: string;
}

/**
 * Speak a prompt and keep the session open for an answer.
 * The markup flags tell the platform whether the text is speech markup
 * or plain text.
 */
export interface AskOutput {
  type: 'ask';
  prompt: string;
  isPromptMarkup: boolean;
  reprompt: string;
  isRepromptMarkup: boolean;
}

/**
 * Speak a final message; the platform ends the session
 */
export interface TellOutput {
  type: 'tell';
  text: string;
  card?: Card;
}

/**
 * Rendering-independent response for one turn
 */
export type AbstractOutput = AskOutput | TellOutput;
