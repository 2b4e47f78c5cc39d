// Response copy shown to participants
// A_CLINICAL is the assessment-style control, B_EMPATHETIC the supportive challenger

import type { ResponseCatalog } from './types.js';

export const DEFAULT_RESPONSES: ResponseCatalog = {
  A_CLINICAL: {
    mild: (
      '**Assessment Complete**\n\n' +
      'Symptom severity: **Mild**\n\n' +
      'Your responses indicate low distress levels. ' +
      'Preventive self-care is recommended. ' +
      'Professional consultation is available if desired.'
    ),
    moderate: (
      '**Assessment Complete**\n\n' +
      'Symptom severity: **Moderate**\n\n' +
      'Your responses indicate moderate distress. ' +
      'Recommended action: consultation with a mental health professional. ' +
      'Early intervention can prevent escalation.'
    ),
    severe: (
      '**Assessment Complete**\n\n' +
      'Symptom severity: **High**\n\n' +
      'Your responses indicate significant distress. ' +
      'Immediate professional support is strongly recommended. ' +
      'A counselor can help you work through these feelings.'
    ),
  },
  B_EMPATHETIC: {
    mild: (
      'Thank you for sharing this with me.\n\n' +
      "It sounds like you're managing, and that takes strength. " +
      'Even when things feel okay, having someone to talk to can help you stay well. ' +
      'Would you like to explore some self-care resources, or connect with a supportive listener?'
    ),
    moderate: (
      'I hear you, and what you are feeling matters.\n\n' +
      "It sounds like you're carrying quite a lot right now, and you don't have to figure it out alone. " +
      'Speaking with someone who understands can make a real difference. ' +
      'Would you be open to connecting with a counselor who can help?'
    ),
    severe: (
      "I'm really glad you reached out. What you're going through sounds incredibly hard.\n\n" +
      'These feelings, as overwhelming as they are, can get better with support. ' +
      "You've taken an important step by sharing this. " +
      'Would you like to connect with a counselor now?'
    ),
  },
};

export const CRISIS_RESOURCES = [
  "## You're Not Alone",
  '',
  "If you're having thoughts of self-harm, please reach out now:",
  '',
  '- **Emergency services**: call your local emergency number',
  '- **Crisis line**: call or text 988 (US) to reach a trained counselor',
  '- **International directory**: findahelpline.com lists free lines in your country',
  '',
  'These services are free, confidential, and available 24/7.',
  '',
  '**You matter. Help is available.**',
].join('\n');
