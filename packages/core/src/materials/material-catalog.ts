import type { BilingualLabel } from "../catalog/themes.ts";

export const COMMON_MATERIALS = [
  "paper",
  "pens",
  "tape",
  "scissors",
  "bowls",
  "rice",
  "flashlight",
] as const;

export type CommonMaterial = (typeof COMMON_MATERIALS)[number];

export type MaterialDefinition = {
  key: CommonMaterial;
  label: BilingualLabel;
  // Substrings of padded, normalized text; " reis " only matches the word.
  aliases: readonly string[];
  substitution: string;
};

export const MATERIAL_CATALOG: Record<CommonMaterial, MaterialDefinition> = {
  paper: {
    key: "paper",
    label: { de: "Papier", en: "Paper" },
    aliases: ["papier", "paper", "zettel", "vorlage", "notizbuch", "notebook"],
    substitution:
      "Nutze abwischbare Fläche (Fenster/Tafel) statt Papier. / Use a wipeable surface instead of paper.",
  },
  pens: {
    key: "pens",
    label: { de: "Stifte", en: "Pens" },
    aliases: ["stift", "marker", "kreide", "crayon", "chalk", " pen ", " pens "],
    substitution: "Nutze Fingerzeigen oder Gegenstände statt Stifte. / Use pointing or objects instead of pens.",
  },
  tape: {
    key: "tape",
    label: { de: "Klebeband", en: "Tape" },
    aliases: ["klebeband", "klebestreifen", " tape "],
    substitution: "Nutze vorhandene Kanten/Linien statt Klebeband. / Use existing edges/lines instead of tape.",
  },
  scissors: {
    key: "scissors",
    label: { de: "Kinderschere", en: "Safety scissors" },
    aliases: ["schere", "scissors"],
    substitution: "Kein Schneiden nötig; stattdessen reißen oder sortieren. / Skip cutting; tear or sort instead.",
  },
  bowls: {
    key: "bowls",
    label: { de: "Schüsseln", en: "Bowls" },
    aliases: ["schüssel", "schuessel", " bowl"],
    substitution:
      "Nutze Becher oder kleine Dosen statt Schüsseln. / Use cups or small containers instead of bowls.",
  },
  rice: {
    key: "rice",
    label: { de: "Reis", en: "Rice" },
    aliases: [" reis ", "reiskorn", "reiskörner", " rice "],
    substitution:
      "Nutze trockene Bohnen/Nudeln oder Naturmaterialien statt Reis. / Use dry beans/pasta or natural items instead of rice.",
  },
  flashlight: {
    key: "flashlight",
    label: { de: "Taschenlampe", en: "Flashlight" },
    aliases: ["taschenlampe", "flashlight", "torch", " lampe "],
    substitution:
      "Nutze Tageslicht und Schatten statt Taschenlampe. / Use daylight and shadows instead of a flashlight.",
  },
};

/** Case-folded, punctuation as spaces, collapsed, padded with one space per side. */
export function normalizeMaterialText(text: string): string {
  const collapsed = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
  return ` ${collapsed} `;
}

/** Maps a user-listed item to a common material by key, label or alias. */
export function resolveMaterialKey(item: string): CommonMaterial | null {
  const normalized = normalizeMaterialText(item).trim();
  if (!normalized) {
    return null;
  }
  for (const key of COMMON_MATERIALS) {
    const definition = MATERIAL_CATALOG[key];
    const names = [
      key,
      definition.label.de.toLowerCase(),
      definition.label.en.toLowerCase(),
      ...definition.aliases.map((alias) => alias.trim()),
    ];
    if (names.includes(normalized)) {
      return key;
    }
  }
  return null;
}

export function materialsMentioned(
  text: string,
  materials: readonly CommonMaterial[],
): CommonMaterial[] {
  const normalized = normalizeMaterialText(text);
  return materials.filter((key) =>
    MATERIAL_CATALOG[key].aliases.some((alias) => normalized.includes(alias))
  );
}
