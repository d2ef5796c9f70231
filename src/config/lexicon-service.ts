import { Lexicon, loadLexicon } from './lexicon';
import { logger } from '../observability/logger';

/**
 * Holds the active lexicon. Reloading swaps it atomically: a load that fails
 * leaves the previous lexicon in place and rethrows.
 */
export class LexiconService {
  private lexicon: Lexicon;
  private loadedAt: Date;

  constructor(private readonly filepath: string) {
    this.lexicon = loadLexicon(filepath);
    this.loadedAt = new Date();
  }

  get(): Lexicon {
    return this.lexicon;
  }

  reload(): Lexicon {
    try {
      this.lexicon = loadLexicon(this.filepath);
      this.loadedAt = new Date();
      return this.lexicon;
    } catch (err) {
      logger.error({ err, filepath: this.filepath }, 'Lexicon reload failed; keeping previous lexicon');
      throw err;
    }
  }

  describe(): { filepath: string; loadedAt: string; languages: string[]; safetyRules: number } {
    return {
      filepath: this.filepath,
      loadedAt: this.loadedAt.toISOString(),
      languages: Object.keys(this.lexicon.localeMarkers),
      safetyRules: this.lexicon.safetyDenylist.length,
    };
  }
}
