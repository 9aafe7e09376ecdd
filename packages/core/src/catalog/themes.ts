export type BilingualLabel = {
  de: string;
  en: string;
};

export type Theme = {
  key: string;
  labels: BilingualLabel;
  match_tags: readonly string[];
};

export const THEMES: readonly Theme[] = [
  { key: "nature", labels: { de: "Natur", en: "Nature" }, match_tags: ["nature"] },
  {
    key: "movement",
    labels: { de: "Bewegung", en: "Movement" },
    match_tags: ["movement", "motor", "adventure"],
  },
  {
    key: "creative",
    labels: { de: "Kreativ", en: "Creative" },
    match_tags: ["creative", "music", "language"],
  },
  { key: "learning", labels: { de: "Lernen", en: "Learning" }, match_tags: ["learning"] },
  {
    key: "mindfulness",
    labels: { de: "Achtsamkeit", en: "Mindfulness" },
    match_tags: ["mindfulness", "calm"],
  },
  {
    key: "social",
    labels: { de: "Sozial", en: "Social" },
    match_tags: ["social", "values", "bonding", "everyday"],
  },
  { key: "water", labels: { de: "Wasser", en: "Water" }, match_tags: ["water"] },
  { key: "rain", labels: { de: "Regen", en: "Rain" }, match_tags: ["rain"] },
  { key: "wind", labels: { de: "Wind", en: "Wind" }, match_tags: ["wind"] },
  { key: "winter", labels: { de: "Winter", en: "Winter" }, match_tags: ["winter"] },
  { key: "evening", labels: { de: "Abend", en: "Evening" }, match_tags: ["evening"] },
  {
    key: "playground",
    labels: { de: "Spielplatz", en: "Playground" },
    match_tags: ["playground"],
  },
];

/** Tags a requested topic stands for; unknown topics match nothing. */
export function resolveThemeTags(topic: string): readonly string[] {
  const normalized = topic.trim().toLowerCase();
  const theme = THEMES.find((candidate) =>
    candidate.key === normalized ||
    candidate.labels.de.toLowerCase() === normalized ||
    candidate.labels.en.toLowerCase() === normalized
  );
  return theme?.match_tags ?? [];
}

export const DEVELOPMENT_GOALS = [
  "gross_motor",
  "fine_motor",
  "language",
  "social_emotional",
  "sensory",
  "cognitive",
] as const;

export type DevelopmentGoal = (typeof DEVELOPMENT_GOALS)[number];

export const DEVELOPMENT_GOAL_LABELS: Record<DevelopmentGoal, BilingualLabel> = {
  gross_motor: { de: "Grobmotorik", en: "Gross motor" },
  fine_motor: { de: "Feinmotorik", en: "Fine motor" },
  language: { de: "Sprache", en: "Language" },
  social_emotional: { de: "Sozial-emotional", en: "Social-emotional" },
  sensory: { de: "Sinne", en: "Sensory" },
  cognitive: { de: "Denken", en: "Cognitive" },
};

export const GOAL_SIGNAL_TAGS: Record<DevelopmentGoal, readonly string[]> = {
  gross_motor: ["movement", "motor", "balance", "climbing", "running", "adventure"],
  fine_motor: ["fine_motor", "sorting", "crafting", "threading", "grasping"],
  language: ["language", "words", "storytelling", "music", "naming"],
  social_emotional: ["social", "bonding", "values", "empathy", "turn_taking"],
  sensory: ["sensory", "water", "texture", "sounds", "nature"],
  cognitive: ["learning", "counting", "colors", "curiosity", "problem_solving"],
};

export function formatGoalLabel(goal: DevelopmentGoal): string {
  const label = DEVELOPMENT_GOAL_LABELS[goal];
  return `${label.de} / ${label.en}`;
}
