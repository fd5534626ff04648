import { SummaryMode, SummaryTone } from "../jobs/types";

export const TONE_INSTRUCTIONS: Record<SummaryTone, string> = {
  [SummaryTone.SIMPLE]: "Use simple, everyday language.",
  [SummaryTone.TECHNICAL]: "Use technical, precise language.",
  [SummaryTone.BEGINNER]:
    "Explain every concept as if the reader is a complete beginner."
};

export const SHARED_GUIDELINES = [
  "Write plain text for a chat message: no Markdown headings, no asterisks, no HTML.",
  "Remove filler, sponsor reads and repetition.",
  "Only state what the transcript supports; do not invent details."
];

export const MODE_TEMPLATES: Record<SummaryMode, string[]> = {
  [SummaryMode.DETAILED]: [
    "Summarize the following video transcript as a structured overview.",
    "Use these sections, each starting on its own line with its emoji:",
    "📝 Main Points",
    "🎯 Important Details",
    "💡 Insights",
    "🔑 Practical Takeaways",
    "Under each section write one or two short paragraphs."
  ],
  [SummaryMode.BULLET]: [
    "Summarize the following video transcript as a list of bullet points.",
    "Start every line with the • character followed by a relevant emoji.",
    "Give between five and twelve points, one idea per point."
  ],
  [SummaryMode.QUICK]: [
    "Summarize the following video transcript in three key points.",
    "Start with the line '📝 Quick Summary:' and put one key point on each of the next three lines."
  ]
};
