// Compatibility switches for opcodes whose behavior differs between interpreters.
// All off reproduces the COSMAC VIP interpreter's reading of the instruction set.
export interface Quirks {
  // 8XY6/8XYE: copy VY into VX before shifting
  readonly shiftCopiesVy: boolean;
  // BNNN: jump to NNN + V[X] (X = top nibble of NNN) instead of NNN + V0
  readonly jumpUsesVx: boolean;
  // FX55/FX65: leave I pointing past the last register transferred
  readonly loadStoreIncrementsI: boolean;
}

export type QuirkName = 'shift' | 'jump' | 'loadstore';

export const DEFAULT_QUIRKS: Quirks = Object.freeze({
  shiftCopiesVy: false,
  jumpUsesVx: false,
  loadStoreIncrementsI: false,
});

const QUIRK_KEYS: Record<QuirkName, keyof Quirks> = {
  shift: 'shiftCopiesVy',
  jump: 'jumpUsesVx',
  loadstore: 'loadStoreIncrementsI',
};

function isQuirkName(s: string): s is QuirkName {
  return Object.prototype.hasOwnProperty.call(QUIRK_KEYS, s);
}

export function resolveQuirks(overrides: Partial<Quirks> = {}): Quirks {
  return Object.freeze({
    shiftCopiesVy: overrides.shiftCopiesVy ?? DEFAULT_QUIRKS.shiftCopiesVy,
    jumpUsesVx: overrides.jumpUsesVx ?? DEFAULT_QUIRKS.jumpUsesVx,
    loadStoreIncrementsI: overrides.loadStoreIncrementsI ?? DEFAULT_QUIRKS.loadStoreIncrementsI,
  });
}

function envFlag(raw: string | undefined): boolean | undefined {
  const v = (raw ?? '').toString().toLowerCase();
  if (v === '1' || v === 'true') return true;
  if (v === '0' || v === 'false') return false;
  return undefined;
}

// CHIP8_QUIRK_SHIFT / CHIP8_QUIRK_JUMP / CHIP8_QUIRK_LOADSTORE
export function quirksFromEnv(env: Record<string, string | undefined>): Partial<Quirks> {
  const out: { -readonly [K in keyof Quirks]?: boolean } = {};
  const shift = envFlag(env.CHIP8_QUIRK_SHIFT);
  const jump = envFlag(env.CHIP8_QUIRK_JUMP);
  const loadStore = envFlag(env.CHIP8_QUIRK_LOADSTORE);
  if (shift !== undefined) out.shiftCopiesVy = shift;
  if (jump !== undefined) out.jumpUsesVx = jump;
  if (loadStore !== undefined) out.loadStoreIncrementsI = loadStore;
  return out;
}

// "shift,jump" -> { shiftCopiesVy: true, jumpUsesVx: true }
export function parseQuirkList(list: string): Partial<Quirks> {
  const out: { -readonly [K in keyof Quirks]?: boolean } = {};
  for (const raw of list.split(',')) {
    const name = raw.trim().toLowerCase();
    if (name.length === 0) continue;
    if (!isQuirkName(name)) {
      throw new TypeError(`Unknown quirk "${raw.trim()}" (expected shift, jump or loadstore)`);
    }
    out[QUIRK_KEYS[name]] = true;
  }
  return out;
}
