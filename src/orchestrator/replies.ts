export { EMPTY_RESPONSE_FALLBACK } from '../llm/sanitizer';

export const EMPTY_INPUT_REPLY = "I'm here when you're ready to share. Take your time.";

export function tooLongReply(limit: number): string {
  return `I want to understand everything you're sharing. Could you break this into smaller parts? (Current limit: ${limit} characters)`;
}

export const CRISIS_REPLY = `I'm really concerned about you right now. Your feelings are valid, but I want to make sure you're safe.

🆘 **Immediate Help Available:**
• National Suicide Prevention Lifeline: **988**
• Crisis Text Line: Text **HOME** to **741741**
• Emergency Services: **911**

You don't have to go through this alone. Please reach out to someone you trust or one of these resources. Your life has value, and there are people who want to help.`;

export const TIMEOUT_REPLY =
  "I'm taking longer than usual to respond. Sometimes I need extra processing time, just like people do. Could you try asking again?";

export const PROCESS_ERROR_REPLY =
  "I'm having trouble processing your message right now. This sometimes happens, and it's not your fault. Could you try rephrasing or asking again?";

export const CANCELLED_REPLY = 'That message was stopped before I could answer. Send it again whenever you like.';

export const UNEXPECTED_ERROR_REPLY =
  "Something unexpected happened on my end. It's not anything you did wrong. Let's try again.";
