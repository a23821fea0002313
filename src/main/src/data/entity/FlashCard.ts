import { Entity, PrimaryColumn, Column, Index } from "typeorm"
import { FlashCard } from "../../types/FlashCard";

@Entity({ name: "flash_cards" })
@Index(["userId", "dueDate"])
export class FlashCardEntity implements FlashCard {

    @PrimaryColumn("text")
    id!: string;

    @Column("text")
    userId!: string;

    @Column("text", { nullable: true })
    noteId!: string | null;

    @Column("text")
    front!: string;

    @Column("text")
    back!: string;

    @Column("text", { default: "" })
    pinyin!: string;

    @Column("text")
    sourceLanguage!: string;

    @Column("text")
    targetLanguage!: string;

    @Column("integer")
    dueDate!: number;

    @Column("integer")
    interval!: number;

    @Column("integer")
    repetition!: number;

    @Column("real")
    efactor!: number;

    @Column("integer", { default: 0 })
    reviewCount!: number;

    @Column("integer", { nullable: true })
    lastReviewedAt!: number | null;

    @Column("integer")
    createdAt!: number;

    @Column("integer")
    updatedAt!: number;

}
