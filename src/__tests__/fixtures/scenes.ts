import type { SceneDocument, ScriptContext } from '../../types/Scene.js';

export const bakeryScript: ScriptContext = {
  SceneBakery: {
    setting: 'A bakery at dawn, ovens still cold',
    characters: 'Baker Lin, tired; Detective Moss, curious',
    plotChain: ['arrive', 'question Lin']
  }
};

export const cellarScene: SceneDocument = {
  SceneCellar: {
    setting: 'The cellar under the bakery',
    characters: 'Baker Lin, nervous',
    plotChain: ['find the ledger'],
    flow: { 'find the ledger': ['Lin: Who is there?', { clue: 'a torn ledger page' }] },
    interactions: { dialogue: ['Ask about the ledger$1'], actions: ['Search the shelves$2'] },
    triggers: { '2': { narration: 'Flour dust everywhere.', clue: 'footprints', goto: 'Ending1' } }
  },
  Ending1: { flow: 'Lin confesses.' }
};
