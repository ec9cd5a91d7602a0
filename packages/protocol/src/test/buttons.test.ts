import assert from "node:assert/strict";
import { test } from "node:test";
import { GamepadButton, buttonNames, diffButtons } from "../buttons";

test("buttonNames lists set buttons in bit order and skips unassigned bits", () => {
  const mask = GamepadButton.Y | GamepadButton.DpadUp | GamepadButton.Start | 0x0400 | 0x0800;
  assert.deepEqual(buttonNames(mask), ["DpadUp", "Start", "Y"]);
});

test("buttonNames returns nothing for a neutral mask", () => {
  assert.deepEqual(buttonNames(0), []);
});

test("diffButtons reports press and release edges", () => {
  const previous = GamepadButton.A | GamepadButton.LeftShoulder;
  const next = GamepadButton.A | GamepadButton.B;

  assert.deepEqual(diffButtons(previous, next), {
    pressed: ["B"],
    released: ["LeftShoulder"],
  });
});
