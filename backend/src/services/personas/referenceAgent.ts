/**
 * Deterministic reference agent used to produce persona test conversations.
 * First matching rule wins.
 */

export type AgentReply = {
  response: string;
  intent: string;
  confidence: number;
};

type Rule = {
  keywords: string[];
  reply: (input: string) => AgentReply;
};

const RULES: Rule[] = [
  {
    keywords: ["book", "appointment", "schedule"],
    reply: () => ({
      response:
        "I'd be happy to help you book an appointment. Could you please tell me your preferred date and what type of visit you need?",
      intent: "appointment_booking",
      confidence: 0.95
    })
  },
  {
    keywords: ["medicine", "medication", "headache", "fever"],
    reply: () => ({
      response:
        "For over-the-counter medication, please check with a pharmacist. If your symptoms persist or get worse, a doctor should see you. Would you like me to book an appointment?",
      intent: "medication_query",
      confidence: 0.9
    })
  },
  {
    keywords: ["accident", "emergency", "scalded", "sprained"],
    reply: () => ({
      response:
        "For an immediate medical concern, please call emergency services or go to the nearest hospital. For a minor injury I can walk you through basic first aid. What happened?",
      intent: "emergency_query",
      confidence: 0.98
    })
  },
  {
    keywords: ["confirm", "reminder"],
    reply: () => ({
      response: "Hello! This is a reminder about your upcoming appointment. Can you confirm you'll be attending?",
      intent: "appointment_reminder",
      confidence: 0.92
    })
  }
];

export function referenceAgentReply(userInput: string): AgentReply {
  const lower = userInput.toLowerCase();
  const rule = RULES.find((r) => r.keywords.some((k) => lower.includes(k)));
  if (rule) return rule.reply(userInput);
  return {
    response: `I understand you said: '${userInput}'. I can help with appointments, health questions and medical guidance. How can I assist you?`,
    intent: "general_query",
    confidence: 0.7
  };
}
