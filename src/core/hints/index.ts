export { HintLadderEngine } from './hint-ladder-engine';
export { fingerprintCode } from './fingerprint';
export type { HintContext, JumpOptions, PreparedLadder, RevealedHint } from './types';
