/** Scene name → scene code, per device model. */
export const SCENES: Readonly<Record<string, Readonly<Record<string, number>>>> = {
  H7020: {
    twighlight: 2070,
    meteor: 2071,
    nebula: 2072,
    illumination: 63,
    bright: 2552,
    colorful: 2553,
    cheerful: 2097,
    meditation: 2098,
    hearthbeat: 65,
    christmas: 2095,
    christmas_tree: 2096,
    sled: 2557,
  },
};

// Models without a table of their own share this one.
export const DEFAULT_SCENE_MODEL = 'H7020';

export function sceneCode(model: string, scene: string): number | undefined {
  const table = SCENES[model] ?? SCENES[DEFAULT_SCENE_MODEL];
  return Object.prototype.hasOwnProperty.call(table, scene) ? table[scene] : undefined;
}

export function sceneNames(model: string): string[] {
  return Object.keys(SCENES[model] ?? SCENES[DEFAULT_SCENE_MODEL]);
}
