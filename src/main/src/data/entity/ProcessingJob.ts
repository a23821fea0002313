import { Entity, PrimaryColumn, Column } from "typeorm"
import { PostProcessingJob, ProcessingJobStatus } from "../../types/ProcessingJob";

@Entity({ name: "processing_jobs" })
export class ProcessingJobEntity {

    @PrimaryColumn("text")
    id!: string;

    @Column("text")
    noteId!: string;

    @Column("text")
    userId!: string;

    @Column("text")
    status!: ProcessingJobStatus;

    @Column("simple-json")
    payload!: PostProcessingJob;

    @Column("integer", { default: 0 })
    retryCount!: number;

    @Column("integer")
    createdAt!: number;

    @Column("integer")
    updatedAt!: number;

}
