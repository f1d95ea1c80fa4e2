import type { ConversationSession } from "../../state.js";
import { normalizeForMatching } from "../helpers/text.js";

export type TransitionSignals = {
  recommendation: boolean;
  nextStep: boolean;
  contactLink: boolean;
  advisor: boolean;
};

// Markers are stored pre-normalized (lowercase, no accents); French and Spanish together.
export const TRANSITION_MARKERS = {
  recommendation: [
    "je vous recommande",
    "je te recommande",
    "nous vous recommandons",
    "je vous conseille",
    "nous vous conseillons",
    "je vous suggere",
    "ma recommandation",
    "notre recommandation",
    "te recomiendo",
    "le recomiendo",
    "les recomiendo",
    "te recomendamos",
    "le recomendamos",
    "te sugiero",
    "le sugiero",
    "mi recomendacion",
    "nuestra recomendacion",
  ],
  nextStep: [
    "prochaine etape",
    "prochaines etapes",
    "etape suivante",
    "etapes suivantes",
    "proximo paso",
    "proximos pasos",
    "siguiente paso",
    "siguientes pasos",
  ],
  contactLink: [
    "wa.me/",
    "api.whatsapp.com/",
    "whatsapp.com/send",
    "contactez directement",
    "contacta directamente",
    "contacte directamente",
  ],
} as const;

const ADVISOR_PATTERN = /\b(?:votre|ton|notre) (?:conseiller|conseillere)\b|\b(?:tu|su|nuestro|nuestra) (?:asesor|asesora)\b/;

export function detectTransitionSignals(agentText: string): TransitionSignals {
  const text = normalizeForMatching(agentText);
  const hasAny = (markers: readonly string[]) => markers.some((marker) => text.includes(marker));
  return {
    recommendation: hasAny(TRANSITION_MARKERS.recommendation),
    nextStep: hasAny(TRANSITION_MARKERS.nextStep),
    contactLink: hasAny(TRANSITION_MARKERS.contactLink),
    advisor: ADVISOR_PATTERN.test(text),
  };
}

/**
 * Decide whether the agent's reply closes the questionnaire:
 * (recommendation AND (next step OR contact link OR advisor)) OR contact link.
 */
export function shouldTransition(agentText: string): boolean {
  const s = detectTransitionSignals(agentText);
  return (s.recommendation && (s.nextStep || s.contactLink || s.advisor)) || s.contactLink;
}

/**
 * Apply the one-way questionnaire → assistance switch. A session that has
 * already completed the questionnaire is returned unchanged.
 */
export function applyModeTransition(
  session: ConversationSession,
  agentText: string
): { session: ConversationSession; transitioned: boolean } {
  if (session.questionnaireCompleted) return { session, transitioned: false };
  if (!shouldTransition(agentText)) return { session, transitioned: false };
  return {
    session: { ...session, mode: "assistance", questionnaireCompleted: true },
    transitioned: true,
  };
}
