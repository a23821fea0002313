import { Entity, PrimaryColumn, Column, Index } from "typeorm"
import { Page } from "../../types/Note";
import { ProcessedText, TextProcessingMode } from "../../types/ProcessedText";
import { ProcessingStatus } from "../../types/ProcessingStatus";

@Entity({ name: "pages" })
@Index(["noteId", "pageNumber"])
export class PageEntity implements Page {

    @PrimaryColumn("text")
    id!: string;

    @Column("text")
    noteId!: string;

    @Column("integer")
    pageNumber!: number;

    @Column("text", { nullable: true })
    imageKey!: string | null;

    @Column("integer", { default: 0 })
    imageFileSize!: number;

    @Column("text", { default: "" })
    cleanedText!: string;

    @Column("text", { default: "" })
    originalText!: string;

    @Column("text", { default: "" })
    translatedText!: string;

    @Column("text", { default: "" })
    pinyin!: string;

    @Column("simple-json")
    textSegments!: string[];

    @Column("simple-json", { nullable: true })
    processedText!: ProcessedText | null;

    @Column("text")
    processingMode!: TextProcessingMode;

    @Column("text")
    processingStatus!: ProcessingStatus;

    @Column("text")
    sourceLanguage!: string;

    @Column("text")
    targetLanguage!: string;

    @Column("integer")
    createdAt!: number;

    @Column("integer")
    updatedAt!: number;

}
