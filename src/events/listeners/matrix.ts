import type { ProgressEvent } from '../types.js';
import { ChapterState, ProgressMatrix } from '../../utils/progress.js';

export class MatrixProgressListener {
  private matrix?: ProgressMatrix;

  listen(event: ProgressEvent): void {
    switch (event.type) {
      case 'chapters:found':
        this.matrix = new ProgressMatrix(event.chapters);
        break;

      case 'chapter:render:start':
        this.matrix?.updateChapterState(event.chapter.number, ChapterState.RENDERING);
        break;

      case 'chapter:render:complete':
        this.matrix?.updateChapterState(event.chapter.number, ChapterState.RENDERED, event.pageCount);
        break;

      case 'pdf:write:complete':
        this.matrix?.updateAllState(ChapterState.MERGED);
        break;

      case 'processing:complete':
        this.matrix?.showSummary();
        break;
    }
  }
}
