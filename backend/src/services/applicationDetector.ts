export type MessageKind = "application" | "information_required_response" | "unrelated";

export interface DetectionContext {
  hasAttachments: boolean;
  knownStudent: boolean;
  keywords: string[];
}

export interface DetectionResult {
  kind: MessageKind;
  matchedRule: string;
  keywordsFound: string[];
}

const BASE_KEYWORDS = [
  "application",
  "apply",
  "applying",
  "internship",
  "position",
  "vacancy",
  "opening",
  "opportunity",
];

const INTENT_PHRASES = ["want", "would like", "seeking", "interested", "wish to", "hereby"];

const RESPONSE_INDICATORS = [
  "re:",
  "response",
  "documents",
  "attached",
  "submission",
  "requested",
  "follow up",
  "followup",
  "as requested",
];

const findAll = (text: string, candidates: string[]): string[] =>
  candidates.filter((candidate) => candidate.length > 0 && text.includes(candidate));

/**
 * Keyword rules: known students replying (reply markers or attachments) are
 * follow-ups; anyone else needs an application keyword plus intent or documents.
 */
export const detectApplicationEmail = (
  subject: string,
  bodyText: string,
  context: DetectionContext,
): DetectionResult => {
  const loweredSubject = subject.toLowerCase();
  const combined = `${loweredSubject}\n${bodyText.toLowerCase()}`;
  const keywords = Array.from(new Set([...BASE_KEYWORDS, ...context.keywords.map((keyword) => keyword.toLowerCase())]));
  const keywordsFound = findAll(combined, keywords);

  if (context.knownStudent) {
    const indicators = findAll(loweredSubject, RESPONSE_INDICATORS);
    if (indicators.length > 0) {
      return { kind: "information_required_response", matchedRule: "reply-indicator", keywordsFound: indicators };
    }
    if (context.hasAttachments) {
      return { kind: "information_required_response", matchedRule: "known-student-attachments", keywordsFound };
    }
  }

  if (keywordsFound.length === 0) {
    return { kind: "unrelated", matchedRule: "no-keywords", keywordsFound };
  }

  if (findAll(combined, INTENT_PHRASES).length > 0) {
    return { kind: "application", matchedRule: "keyword-with-intent", keywordsFound };
  }
  if (context.hasAttachments) {
    return { kind: "application", matchedRule: "keyword-with-attachments", keywordsFound };
  }

  return { kind: "unrelated", matchedRule: "keyword-without-intent", keywordsFound };
};
