import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, Unique } from "typeorm";
import type { ApplicationRecord, ApplicationStatus } from "../../types/application";

/**
 * Application Entity
 *
 * Hiring-pipeline envelope, one per (job, candidate) pair. Jobs and candidates
 * are owned by other services; only their ids are kept here.
 *
 * Status flow:
 * NEW → INVITED/APPLIED → SCREENING → INTERVIEW → OFFER → HIRED
 * REJECTED from any non-terminal status.
 */
@Entity({ name: "applications" })
@Unique("UQ_applications_job_candidate", ["jobId", "candidateId"])
export class Application implements ApplicationRecord {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: "job_id", type: "varchar", length: 64 })
    jobId!: string;

    @Column({ name: "candidate_id", type: "varchar", length: 64 })
    candidateId!: string;

    @Column({ type: "varchar", length: 20, default: "NEW" })
    status!: ApplicationStatus;

    @CreateDateColumn({ name: "created_at", type: "timestamptz" })
    createdAt!: Date;

    @UpdateDateColumn({ name: "updated_at", type: "timestamptz" })
    updatedAt!: Date;
}
