export interface Target {
  name: string;
  /** PINE slot the emulator listens on unless configured otherwise. */
  defaultSlot: number;
}

/** Known emulators, in probe order. */
export const TARGETS: readonly Target[] = [
  { name: 'pcsx2', defaultSlot: 28011 },
  { name: 'rpcs3', defaultSlot: 28012 },
];

export const TARGET_NAMES: readonly string[] = TARGETS.map((t) => t.name);

export function findTarget(name: string): Target | undefined {
  return TARGETS.find((t) => t.name === name);
}
