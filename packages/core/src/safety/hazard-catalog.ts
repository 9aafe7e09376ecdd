export type PlanSafetyRules = {
  version: string;
  always_blocked: readonly string[];
  scissors_terms: readonly string[];
  child_safe_scissors_markers: readonly string[];
  supervision_markers: readonly string[];
  choking_terms: readonly string[];
  scissors_min_age_months: number;
  child_safe_scissors_min_age_months: number;
  choking_min_age_months: number;
};

// Terms are matched as substrings of normalized text. A leading or trailing
// space restricts the match to a word boundary on that side.
export const PLAN_HAZARDS_V1: PlanSafetyRules = {
  version: "plan_hazards_v1",
  always_blocked: [
    " messer ",
    "taschenmesser",
    "küchenmesser",
    "kuechenmesser",
    "schnitzmesser",
    "knife",
    "knives",
    " klinge ",
    "rasierklinge",
    " blade ",
    "cutter",
    "skalpell",
    "scalpel",
    "razor",
    "säge",
    " axt ",
    " axe ",
    " waffe ",
    " waffen ",
    "weapon",
    "pistole",
    " gun ",
    "lagerfeuer",
    " feuer ",
    "feuerzeug",
    "feuerwerk",
    "campfire",
    "bonfire",
    "firework",
    "fire pit",
    "light a fire",
    "make a fire",
    "start a fire",
    "open fire",
    "flamme",
    "flame",
    "kerze",
    "candle",
    "streichholz",
    "streichhölzer",
    " grill ",
    "grillkohle",
    "grillen am",
    "barbecue",
    " bbq ",
    "herdplatte",
    "stove",
    "backofen",
    " oven ",
    "bügeleisen",
    "heißes wasser",
    "kochendes wasser",
    "boiling water",
    "hot water",
    "sparkler",
    "bleichmittel",
    "bleach",
    " chlor ",
    "chlorine",
    "lösungsmittel",
    "loesungsmittel",
    "solvent",
    "abflussreiniger",
    "drain cleaner",
    "ammoniak",
    "ammonia",
    "reinigungsmittel",
  ],
  scissors_terms: ["schere", "scissors"],
  child_safe_scissors_markers: [
    "kinderschere",
    "kinder schere",
    "kindersichere schere",
    "sicherheitsschere",
    "child safe scissors",
    "safety scissors",
    "kids scissors",
    "children s scissors",
  ],
  supervision_markers: ["aufsicht", "beaufsichtig", "supervis"],
  choking_terms: [
    "perle",
    "bead",
    "murmel",
    "marble",
    "münze",
    "muenze",
    "coin",
    "knopfzelle",
    "button batter",
    "kleinteil",
    "small part",
  ],
  scissors_min_age_months: 72,
  child_safe_scissors_min_age_months: 48,
  choking_min_age_months: 36,
};
