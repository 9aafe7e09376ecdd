import type { DevelopmentGoal } from "../catalog/themes.ts";
import type { ParentChildPrompt } from "./activity-plan.ts";

export const GENERIC_PROMPTS: readonly ParentChildPrompt[] = [
  {
    say: "Was siehst du hier? / What do you see here?",
    do: "Zeigt gemeinsam auf eine Sache und benennt sie. / Point at one thing together and name it.",
  },
  {
    say: "Wie fühlt sich das an? / How does that feel?",
    do: "Lass dein Kind etwas ertasten und beschreiben. / Let your child touch something and describe it.",
  },
  {
    say: "Was machen wir als Nächstes? / What shall we do next?",
    do: "Lass dein Kind den nächsten Schritt wählen. / Let your child choose the next step.",
  },
  {
    say: "Das hast du toll gemacht! / You did that really well!",
    do: "Lobe eine konkrete Handlung deines Kindes. / Praise one specific thing your child did.",
  },
];

export const GOAL_PROMPTS: Record<DevelopmentGoal, ParentChildPrompt> = {
  gross_motor: {
    say: "Kannst du wie ein Frosch hüpfen? / Can you hop like a frog?",
    do: "Macht die Bewegung zusammen vor und nach. / Do the movement together.",
  },
  fine_motor: {
    say: "Kannst du das ganz vorsichtig greifen? / Can you pick that up very gently?",
    do: "Gib deinem Kind einen kleinen Gegenstand zum Greifen. / Hand your child an object to grasp.",
  },
  language: {
    say: "Wie heißt das? / What is this called?",
    do: "Wiederhole das Wort deines Kindes und ergänze eines. / Repeat your child's word and add one more.",
  },
  social_emotional: {
    say: "Wie geht es dir gerade? / How are you feeling right now?",
    do: "Benennt zusammen ein Gefühl. / Name a feeling together.",
  },
  sensory: {
    say: "Was hörst du gerade? / What can you hear right now?",
    do: "Seid kurz still und lauscht gemeinsam. / Be quiet for a moment and listen together.",
  },
  cognitive: {
    say: "Wie viele siehst du? / How many can you see?",
    do: "Zählt gemeinsam laut bis drei. / Count out loud to three together.",
  },
};
