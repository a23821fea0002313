import { Entity, PrimaryColumn, Column, Index } from "typeorm"
import { Note } from "../../types/Note";
import { ProcessingStatus } from "../../types/ProcessingStatus";

@Entity({ name: "notes" })
@Index(["userId", "createdAt"])
export class NoteEntity implements Note {

    @PrimaryColumn("text")
    id!: string;

    @Column("text")
    userId!: string;

    @Column("text")
    title!: string;

    @Column("text", { nullable: true })
    description!: string | null;

    @Column("boolean", { default: false })
    isFavorite!: boolean;

    @Column("integer", { default: 0 })
    flashcardCount!: number;

    @Column("integer", { default: 0 })
    pageCount!: number;

    @Column("text", { nullable: true })
    thumbnailKey!: string | null;

    @Column("text")
    processingStatus!: ProcessingStatus;

    @Column("real", { default: 0 })
    processingProgress!: number;

    @Column("text", { nullable: true })
    processingError!: string | null;

    @Column("integer")
    createdAt!: number;

    @Column("integer")
    updatedAt!: number;

}
