export enum CapabilityKind {
  Knowledge = "Knowledge",
  Search = "Search",
  Messaging = "Messaging",
  VoiceSms = "VoiceSms",
  Calendar = "Calendar",
  Unknown = "Unknown",
}

// Planner agent names (lowercased) → capability. Anything else is Unknown.
const AGENT_ALIASES: Record<string, CapabilityKind> = {
  knowledgeagent: CapabilityKind.Knowledge,
  knowledge: CapabilityKind.Knowledge,
  searchagent: CapabilityKind.Search,
  search: CapabilityKind.Search,
  slackagent: CapabilityKind.Messaging,
  slack: CapabilityKind.Messaging,
  messaging: CapabilityKind.Messaging,
  communicationagent: CapabilityKind.VoiceSms,
  communication: CapabilityKind.VoiceSms,
  voicesms: CapabilityKind.VoiceSms,
  "voice/sms": CapabilityKind.VoiceSms,
  calendaragent: CapabilityKind.Calendar,
  calendar: CapabilityKind.Calendar,
};

export function resolveCapability(agentName: string): CapabilityKind {
  const key = agentName.trim().toLowerCase();
  return Object.hasOwn(AGENT_ALIASES, key)
    ? AGENT_ALIASES[key]
    : CapabilityKind.Unknown;
}

export interface CalendarEventDetails {
  title?: string;
  start_time?: string;
  end_time?: string;
}

export interface MessagingProvider {
  /** Rejects on transport or auth errors. */
  post(channel: string, text: string): Promise<void>;
}

export interface KnowledgeProvider {
  /** Never rejects; failures come back as explanatory text. */
  answer(query: string): Promise<string>;
}

export interface SearchProvider {
  /** Never rejects; failures come back as explanatory text. */
  query(query: string): Promise<string>;
}

export interface CalendarProvider {
  /** Resolves to a link to the created event. */
  createEvent(details: CalendarEventDetails): Promise<string>;
}

export interface SmsProvider {
  /** Resolves to the message id. */
  send(recipient: string, text: string): Promise<string>;
}

export interface VoiceProvider {
  /** Resolves to the call id. */
  call(recipient: string, text: string): Promise<string>;
}

export interface CapabilityProviders {
  messaging: MessagingProvider;
  knowledge: KnowledgeProvider;
  search: SearchProvider;
  calendar: CalendarProvider;
  sms: SmsProvider;
  voice: VoiceProvider;
}
