// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * Deterministic fallback content, used when generation is unavailable or the
 * model response cannot be parsed. Everything here is flagged
 * `contentSource: "fallback"` by the callers.
 */

import type { AssessmentQuestionContent, DecisionPointContent, NarrativeContent } from "./content-schemas";
import type { SecurityDomain } from "./schemas";

export function formatDomain(domain: SecurityDomain): string {
  return domain === "other" ? "security" : domain.replace(/_/g, " ");
}

// ---------------------------------------------------------------------------
// Narratives
// ---------------------------------------------------------------------------

const FALLBACK_NARRATIVES: Readonly<Record<SecurityDomain, NarrativeContent>> = {
  phishing: {
    title: "The Suspicious Email",
    description:
      "You receive an urgent email claiming to be from your company's IT department requesting you to verify your credentials due to a security breach.",
  },
  ransomware: {
    title: "Locked Out",
    description:
      "You arrive at work to find your computer locked with a message demanding payment to restore your files.",
  },
  social_engineering: {
    title: "The Unexpected Visitor",
    description:
      "A person you don't recognize is at the office reception claiming to be a new IT contractor who needs access to the server room.",
  },
  data_protection: {
    title: "The Data Transfer Request",
    description:
      "A senior executive emails you requesting an urgent transfer of sensitive customer data to an external consultant.",
  },
  network_security: {
    title: "The New WiFi Network",
    description:
      "While working at a coffee shop, you notice a new WiFi network with your company's name that doesn't require a password.",
  },
  other: {
    title: "The Unusual Request",
    description:
      "A message arrives asking you to bypass a routine security check just this once because a deadline is at risk.",
  },
};

export function fallbackNarrative(domain: SecurityDomain): NarrativeContent {
  return { ...FALLBACK_NARRATIVES[domain] };
}

// ---------------------------------------------------------------------------
// Decision points
// ---------------------------------------------------------------------------

const DECISION_TEMPLATES: ReadonlyArray<(label: string) => DecisionPointContent> = [
  (label) => ({
    question: `What do you do first in this ${label} situation?`,
    options: [
      {
        text: "Take immediate action without verification",
        feedback: "Acting before verifying can spread the damage or play into the attacker's hands.",
      },
      {
        text: "Follow security protocols and report the incident",
        feedback:
          "Reporting through the official channel gets specialists involved early and preserves evidence.",
      },
      {
        text: "Ignore the situation as it's probably not serious",
        feedback: "Ignoring warning signs gives an attacker more time to operate.",
      },
      {
        text: "Ask a colleague what they would do",
        feedback: "Informal advice is no substitute for your organization's incident procedures.",
      },
    ],
    correctOptionIndex: 1,
  }),
  (label) => ({
    question: `While the ${label} incident is being investigated, what should you do?`,
    options: [
      {
        text: "Delete anything related to the incident so it cannot cause more harm",
        feedback: "Deleting material destroys evidence investigators need to scope the incident.",
      },
      {
        text: "Write down what you observed and avoid interacting with anything suspicious",
        feedback: "A clear record of what happened helps responders, and leaving items untouched preserves evidence.",
      },
      {
        text: "Post a warning about it on social media",
        feedback: "Public posts can alert the attacker and expose internal details.",
      },
      {
        text: "Carry on as normal and forget about it",
        feedback: "Responders may need your input; stay available and alert.",
      },
    ],
    correctOptionIndex: 1,
  }),
  (label) => ({
    question: `Which measure would best prevent a repeat of this ${label} incident?`,
    options: [
      {
        text: "Rely on antivirus software alone",
        feedback: "Technical controls help, but attackers routinely target people rather than software.",
      },
      {
        text: "Disable all email and network access",
        feedback: "Blocking all access stops the business as well as the attacker.",
      },
      {
        text: "Share passwords only with trusted colleagues",
        feedback: "Passwords should never be shared, even with people you trust.",
      },
      {
        text: "Regular security awareness training and up-to-date security controls",
        feedback: "Layered defenses combine informed people with patched, well-configured systems.",
      },
    ],
    correctOptionIndex: 3,
  }),
];

/**
 * Returns `count` fallback decision points, cycling through the templates
 * when more are required than exist.
 */
export function fallbackDecisionPoints(domain: SecurityDomain, count: number): DecisionPointContent[] {
  const label = formatDomain(domain);
  return Array.from({ length: count }, (_, i) => {
    const template = DECISION_TEMPLATES[i % DECISION_TEMPLATES.length];
    if (!template) throw new Error("No fallback decision templates defined");
    const content = template(label);
    return i < DECISION_TEMPLATES.length
      ? content
      : { ...content, question: `(${i + 1}) ${content.question}` };
  });
}

// ---------------------------------------------------------------------------
// Assessment
// ---------------------------------------------------------------------------

const ASSESSMENT_TEMPLATES: ReadonlyArray<(label: string) => AssessmentQuestionContent> = [
  (label) => ({
    question: `What is the most important first step when dealing with a ${label} threat?`,
    options: [
      "Immediately shut down all systems",
      "Report the incident to your security team",
      "Try to fix the issue yourself",
      "Ignore it if it doesn't affect your work",
    ],
    correctOptionIndex: 1,
    explanation: `When facing a ${label} threat, the first step should always be to report it to your security team, who have the expertise to handle it properly.`,
  }),
  (label) => ({
    question: `Which of the following is a best practice for ${label} prevention?`,
    options: [
      "Only check emails during certain hours",
      "Share security responsibilities with colleagues",
      "Regularly update software and security patches",
      "Use the same password for all accounts",
    ],
    correctOptionIndex: 2,
    explanation:
      "Regular updates ensure that known vulnerabilities are patched, significantly reducing the risk of security breaches.",
  }),
  () => ({
    question: "Why is security awareness training important?",
    options: [
      "It's only important for IT staff",
      "It helps all employees recognize and respond to threats",
      "It's a regulatory requirement but has little practical value",
      "It only matters for large enterprises",
    ],
    correctOptionIndex: 1,
    explanation:
      "Human error is often the weakest link in security; trained employees act as a first line of defense.",
  }),
];

export function fallbackAssessment(domain: SecurityDomain, count: number): AssessmentQuestionContent[] {
  const label = formatDomain(domain);
  return Array.from({ length: count }, (_, i) => {
    const template = ASSESSMENT_TEMPLATES[i % ASSESSMENT_TEMPLATES.length];
    if (!template) throw new Error("No fallback assessment templates defined");
    const content = template(label);
    return i < ASSESSMENT_TEMPLATES.length
      ? content
      : { ...content, question: `(${i + 1}) ${content.question}` };
  });
}

// ---------------------------------------------------------------------------
// Learning moments and feedback
// ---------------------------------------------------------------------------

const LEARNING_MOMENTS: Readonly<Record<SecurityDomain, string>> = {
  phishing:
    "Phishing relies on urgency and trust. Check the sender's real address, hover over links before clicking, and report suspicious messages instead of replying to them.",
  ransomware:
    "Ransomware thrives on unpatched systems and missing backups. Keep software updated, keep offline backups, and disconnect an infected machine from the network before reporting it.",
  social_engineering:
    "Social engineers exploit helpfulness and authority. Verify identities through a channel you already trust, and never grant access just because someone sounds confident.",
  data_protection:
    "Sensitive data should only move through approved channels to verified recipients. Confirm unusual requests out-of-band and share the minimum data needed.",
  network_security:
    "Untrusted networks can intercept your traffic. Avoid open networks for work, use the company VPN, and confirm network names with the venue or IT before connecting.",
  other:
    "Security procedures exist for moments of pressure. When a request asks you to skip a control, pause, verify, and escalate through the proper channel.",
};

export function fallbackLearningMoment(domain: SecurityDomain): string {
  return LEARNING_MOMENTS[domain];
}

export function fallbackFeedback(optionFeedback: string, wasCorrect: boolean): string {
  if (optionFeedback.trim() !== "") return optionFeedback;
  return wasCorrect
    ? "Good choice. This response follows established security practice."
    : "This choice carries risk. Review the recommended response and the reasoning behind it.";
}
