import { SessionType } from '../shared/types';

const BEL = '\u0007';

export type BellCue = 'workComplete' | 'breakComplete' | 'sessionStart';

const RINGS: Record<BellCue, number> = {
  workComplete: 3,
  breakComplete: 1,
  sessionStart: 2,
};

/** Terminal bell cues for session boundaries. */
export class BellNotifier {
  private _enabled: boolean;

  constructor(private readonly write: (chunk: string) => void, enabled = true) {
    this._enabled = enabled;
  }

  get enabled(): boolean { return this._enabled; }

  setEnabled(enabled: boolean): void {
    this._enabled = enabled;
  }

  ring(cue: BellCue): void {
    if (!this._enabled) return;
    this.write(BEL.repeat(RINGS[cue]));
  }

  sessionComplete(type: SessionType): void {
    this.ring(type === 'work' ? 'workComplete' : 'breakComplete');
  }
}
