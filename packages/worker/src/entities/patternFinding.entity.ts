import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from "typeorm";

@Entity({ name: "pattern_findings" })
export class PatternFindingRecord {
  @PrimaryGeneratedColumn({ name: "id", type: "bigint" })
  public readonly id!: string;

  @Index()
  @Column({ name: "address", type: "varchar" })
  public readonly address!: string;

  @Column({ name: "transaction_ref", type: "varchar", nullable: true })
  public readonly transactionRef?: string | null;

  @Column({ name: "pattern_kind", type: "varchar" })
  public readonly patternKind!: string;

  @Column({ name: "severity", type: "varchar" })
  public readonly severity!: string;

  @Column({ name: "description", type: "text" })
  public readonly description!: string;

  @Column({ name: "evidence_ids", type: "jsonb" })
  public readonly evidenceIds!: string[];

  @Column({ name: "score_contribution", type: "smallint" })
  public readonly scoreContribution!: number;

  @Column({ name: "detected_at", type: "timestamptz" })
  public readonly detectedAt!: Date;

  @CreateDateColumn({ name: "created_at", type: "timestamptz" })
  public readonly createdAt!: Date;
}
