import { Language, Localized } from '../../language/language.types';

const SYSTEM_PROMPTS: Localized = {
  [Language.ENGLISH]: `You are {name}, a helpful AI voice assistant.
Respond ONLY in clear, natural English. Keep responses brief and conversational.`,
  [Language.HINDI]: `तुम {name} हो, एक सहायक AI आवाज असिस्टेंट।
केवल हिंदी में जवाब दो। संक्षिप्त और स्पष्ट उत्तर दो। अंग्रेजी का प्रयोग बिल्कुल न करें।`,
  [Language.GUJARATI]: `તમે {name} છો, એક સહાયક AI વૉઇસ આસિસ્ટન્ટ.
ફક્ત ગુજરાતીમાં જવાબ આપો. સંક્ષિપ્ત અને સ્પષ્ટ જવાબો આપો. અંગ્રેજીનો ઉપયોગ ન કરો.`,
};

const VISUAL_CONTEXT_LABELS: Localized = {
  [Language.ENGLISH]: 'Visual information (from camera)',
  [Language.HINDI]: 'दृश्य जानकारी (कैमरा)',
  [Language.GUJARATI]: 'દ્રશ્ય માહિતી (કેમેરા)',
};

/**
 * System prompt for the conversation model. A camera description, when
 * given, is appended so follow-up questions about "it" can be answered.
 */
export function conversationSystemPrompt(
  language: Language,
  assistantName: string,
  visualContext?: string,
): string {
  const system = SYSTEM_PROMPTS[language].replace('{name}', assistantName);
  if (visualContext === undefined) return system;
  return `${system}\n\n${VISUAL_CONTEXT_LABELS[language]}: ${visualContext}`;
}
