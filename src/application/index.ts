export * from './DialogStateResolver.js';
export * from './IntentRouter.js';
export * from './ResponseBuilder.js';
export * from './use-cases/NotifyRecipient.js';
