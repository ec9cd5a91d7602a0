import { GamepadState } from "@padlink/protocol";

/**
 * Where the sender gets controller state from. `null` means no device is attached;
 * the sender then transmits a neutral heartbeat so the host keeps the slot.
 */
export interface InputSource {
  read(): GamepadState | null;
}

export class NeutralInputSource implements InputSource {
  public read(): GamepadState | null {
    return null;
  }
}
