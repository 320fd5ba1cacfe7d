import { posix } from 'node:path';
import { candidateStems, PANEL_SKIN_RULES } from '@game/config/skinRules';
import {
  InteractionState,
  LogicalControl,
  type ButtonSkinRequest,
  type PanelId
} from '@game/types/Controls';

export interface UploadedSkin {
  readonly kind: 'uploaded';
  readonly stem: string;
  readonly fileName: string;
  readonly url: string;
}

export interface DefaultSkin {
  readonly kind: 'default';
  readonly role: 'button' | 'panel';
  /** RGB fill, 0xRRGGBB. */
  readonly fill: number;
  readonly alpha: number;
}

export type ResourceHandle = UploadedSkin | DefaultSkin;

export const DEFAULT_BUTTON_SKIN: DefaultSkin = Object.freeze({
  kind: 'default',
  role: 'button',
  fill: 0x1e2c50,
  alpha: 220 / 255
});

export const DEFAULT_PANEL_SKIN: DefaultSkin = Object.freeze({
  kind: 'default',
  role: 'panel',
  fill: 0x101424,
  alpha: 230 / 255
});

export interface AssetManifestOptions {
  /** Prefix for handle URLs. Defaults to `res/assets/ui/`. */
  basePath?: string;
}

export interface SkinCoverageGap {
  control: LogicalControl;
  state: InteractionState;
  candidates: readonly string[];
}

const DEFAULT_BASE_PATH = 'res/assets/ui/';

/**
 * `dir/Btn_Spin.PNG` → `btn_spin`. Both path separators are accepted.
 */
export function stemOf(fileName: string): string {
  return posix.parse(fileName.replace(/\\/g, '/')).name.toLowerCase();
}

export function getAssetUrl(basePath: string, fileName: string): string {
  if (basePath === '') return fileName;
  return basePath.endsWith('/') ? `${basePath}${fileName}` : `${basePath}/${fileName}`;
}

/**
 * Snapshot of the uploaded control art, keyed by lower-cased stem.
 * Snapshots never change; a re-upload produces a new one.
 */
export class AssetManifest {
  private constructor(
    private readonly byStem: ReadonlyMap<string, UploadedSkin>,
    private readonly basePath: string
  ) {}

  static empty(options: AssetManifestOptions = {}): AssetManifest {
    return new AssetManifest(new Map(), options.basePath ?? DEFAULT_BASE_PATH);
  }

  /** Later files win when two uploads share a stem. */
  static fromUploads(fileNames: Iterable<string>, options: AssetManifestOptions = {}): AssetManifest {
    return AssetManifest.empty(options).replace(fileNames);
  }

  get size(): number {
    return this.byStem.size;
  }

  has(stem: string): boolean {
    return this.byStem.has(stem.toLowerCase());
  }

  stems(): string[] {
    return [...this.byStem.keys()].sort();
  }

  /** New snapshot with `fileNames` added over this one. */
  replace(fileNames: Iterable<string>): AssetManifest {
    const next = new Map(this.byStem);
    for (const raw of fileNames) {
      const stem = stemOf(raw);
      if (!stem) continue;
      const fileName = posix.basename(raw.replace(/\\/g, '/'));
      const skin: UploadedSkin = {
        kind: 'uploaded',
        stem,
        fileName,
        url: getAssetUrl(this.basePath, fileName)
      };
      next.set(stem, Object.freeze(skin));
    }
    return new AssetManifest(next, this.basePath);
  }

  resolve(request: ButtonSkinRequest): ResourceHandle {
    return this.firstPresent(
      candidateStems(request.logicalControl, request.interactionState)
    ) ?? DEFAULT_BUTTON_SKIN;
  }

  resolvePanel(panel: PanelId): ResourceHandle {
    return this.firstPresent(PANEL_SKIN_RULES[panel]) ?? DEFAULT_PANEL_SKIN;
  }

  /** Every control/state pair that would render with the default skin. */
  coverage(): SkinCoverageGap[] {
    const gaps: SkinCoverageGap[] = [];
    for (const control of Object.values(LogicalControl)) {
      for (const state of Object.values(InteractionState)) {
        const candidates = candidateStems(control, state);
        if (!this.firstPresent(candidates)) {
          gaps.push({ control, state, candidates });
        }
      }
    }
    return gaps;
  }

  private firstPresent(candidates: readonly string[]): UploadedSkin | undefined {
    for (const stem of candidates) {
      const hit = this.byStem.get(stem.toLowerCase());
      if (hit) return hit;
    }
    return undefined;
  }
}
