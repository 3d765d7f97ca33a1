/**
 * Who produced a turn in the call
 */
export type SpeakerRole = 'customer' | 'agent';

/**
 * One recognized utterance in a call. Owned by the call session, never mutated here.
 */
export interface ConversationTurn {
  role: SpeakerRole;
  text: string;
  timestamp: Date;
}

export type ConversationHistory = readonly ConversationTurn[];

/**
 * Per-call context supplied by the customer record store
 */
export interface ClassificationContext {
  /** Area or locality the customer is registered in */
  customerArea?: string;
  /** Outages currently open for the network */
  activeIncidents?: readonly ActiveIncident[];
}

export interface ActiveIncident {
  id: string;
  issueType: string;
  area: string;
}
