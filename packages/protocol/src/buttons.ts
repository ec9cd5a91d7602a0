export const GamepadButton = {
  DpadUp: 0x0001,
  DpadDown: 0x0002,
  DpadLeft: 0x0004,
  DpadRight: 0x0008,
  Start: 0x0010,
  Back: 0x0020,
  LeftThumb: 0x0040,
  RightThumb: 0x0080,
  LeftShoulder: 0x0100,
  RightShoulder: 0x0200,
  A: 0x1000,
  B: 0x2000,
  X: 0x4000,
  Y: 0x8000,
} as const;

export type GamepadButtonName = keyof typeof GamepadButton;

const BUTTON_ORDER: readonly GamepadButtonName[] = [
  "DpadUp",
  "DpadDown",
  "DpadLeft",
  "DpadRight",
  "Start",
  "Back",
  "LeftThumb",
  "RightThumb",
  "LeftShoulder",
  "RightShoulder",
  "A",
  "B",
  "X",
  "Y",
];

const BUTTON_ENTRIES = BUTTON_ORDER.map((name) => [name, GamepadButton[name]] as const);

export interface ButtonEdges {
  pressed: GamepadButtonName[];
  released: GamepadButtonName[];
}

/**
 * Names of the buttons set in a mask, in bit order. Bits 0x0400 and 0x0800 are
 * unassigned and never reported.
 */
export function buttonNames(mask: number): GamepadButtonName[] {
  return BUTTON_ENTRIES.filter(([, bit]) => (mask & bit) !== 0).map(([name]) => name);
}

export function diffButtons(previous: number, next: number): ButtonEdges {
  const pressed: GamepadButtonName[] = [];
  const released: GamepadButtonName[] = [];

  for (const [name, bit] of BUTTON_ENTRIES) {
    const had = (previous & bit) !== 0;
    const has = (next & bit) !== 0;
    if (has && !had) {
      pressed.push(name);
    } else if (had && !has) {
      released.push(name);
    }
  }

  return { pressed, released };
}
