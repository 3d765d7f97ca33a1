export * from './conversation.interface';
export * from './lexicon.interface';
export * from './classification.interface';
export * from './troubleshooting.interface';
export * from './escalation.interface';
