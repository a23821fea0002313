import { DataSource } from "typeorm";
import { RemoteCacheSource } from "../cache/UnifiedCacheService";
import { FlashCard } from "../types/FlashCard";
import { ProcessedText, TextProcessingMode } from "../types/ProcessedText";
import { FlashCardEntity } from "./entity/FlashCard";
import { NoteEntity } from "./entity/Note";
import { PageEntity } from "./entity/Page";

/** The document store seen as the remote cache tier of one user: page results by page id, cards by note. */
export class DocumentStoreCacheSource implements RemoteCacheSource {
    constructor(
        private readonly dataSource: DataSource,
        private readonly userId: string,
        private readonly now: () => number = Date.now,
    ) {}

    private async ownPage(pageId: string) {
        const page = await this.dataSource.manager.findOneBy(PageEntity, { id: pageId });
        if (!page) {
            return null;
        }
        const owned = await this.dataSource.manager.countBy(NoteEntity, { id: page.noteId, userId: this.userId });
        return owned > 0 ? page : null;
    }

    async getSegments(pageId: string, mode: TextProcessingMode): Promise<ProcessedText | null> {
        const processedText = (await this.ownPage(pageId))?.processedText ?? null;
        return processedText?.mode === mode ? processedText : null;
    }

    async saveSegments(pageId: string, segments: ProcessedText) {
        if (!(await this.ownPage(pageId))) {
            return;
        }
        await this.dataSource.manager.update(PageEntity, { id: pageId }, { processedText: segments, updatedAt: this.now() });
    }

    async getFlashcards(noteId: string): Promise<FlashCard[]> {
        return this.dataSource.manager.find(FlashCardEntity, {
            where: { userId: this.userId, noteId },
            order: { createdAt: "ASC" },
        });
    }
}
