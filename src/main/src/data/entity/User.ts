import { Entity, PrimaryColumn, Column } from "typeorm"
import { PlanStatus } from "../../types/PlanStatus";

@Entity({ name: "users" })
export class UserEntity {

    @PrimaryColumn("text")
    id!: string;

    @Column("text")
    planStatus!: PlanStatus;

    @Column("boolean", { default: false })
    hasUsedTrial!: boolean;

    @Column("integer", { nullable: true })
    trialStartedAt!: number | null;

    @Column("integer", { nullable: true })
    expiresAt!: number | null;

    @Column("text", { nullable: true })
    productId!: string | null;

    @Column("boolean", { default: false })
    autoRenew!: boolean;

    @Column("boolean", { default: false })
    billingIssue!: boolean;

    @Column("integer")
    createdAt!: number;

    @Column("integer")
    updatedAt!: number;

}
