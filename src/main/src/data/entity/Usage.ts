import { Entity, PrimaryColumn, Column, Index } from "typeorm"

/** Usage of one user within one calendar month (`yyyy-MM`). */
@Entity({ name: "usage" })
@Index(["userId", "period"], { unique: true })
export class UsageEntity {

    @PrimaryColumn("text")
    id!: string;

    @Column("text")
    userId!: string;

    @Column("text")
    period!: string;

    @Column("integer", { default: 0 })
    ocrPages!: number;

    @Column("integer", { default: 0 })
    ttsRequests!: number;

    @Column("integer", { default: 0 })
    translatedChars!: number;

    @Column("integer", { default: 0 })
    storageBytes!: number;

}
