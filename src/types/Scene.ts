/**
 * Script the player is currently in, keyed by scene name. Passed through to
 * the prompts untouched.
 */
export type ScriptContext = Record<string, unknown>;

export interface InteractionRecord {
  scene: string;
  action: string;
  result: string;
}

/** What the player has seen and done so far. Missing lists count as empty. */
export interface GameLog {
  plotHistory?: string[];
  clueHistory?: string[];
  hintHistory?: string[];
  interactionHistory?: InteractionRecord[];
}

export type FlowLine = string | Record<string, string>;

export interface SceneTrigger {
  narration: string;
  clue?: string;
  goto: string;
}

/** A playable scene; its name starts with "Scene". */
export interface SceneContent {
  setting: string;
  characters: string;
  plotChain: string[];
  flow: Record<string, FlowLine[]>;
  interactions: {
    dialogue: string[];
    actions: string[];
  };
  triggers: Record<string, SceneTrigger>;
}

/** An ending; its name starts with "Ending". */
export interface EndingContent {
  flow: string;
}

/**
 * One candidate continuation: a new scene, optionally with the endings its
 * triggers jump to.
 */
export type SceneDocument = Record<string, SceneContent | EndingContent>;

export interface SceneEvaluation {
  score: number;
  reason: string;
}

export function normalizeGameLog(log: GameLog | null | undefined): Required<GameLog> {
  return {
    plotHistory: log?.plotHistory ?? [],
    clueHistory: log?.clueHistory ?? [],
    hintHistory: log?.hintHistory ?? [],
    interactionHistory: log?.interactionHistory ?? []
  };
}
