import { AlertKind, Severity } from "risk-scoring";
import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from "typeorm";
import { bigIntTransformer } from "../transformers/bigInt.transformer";

@Entity({ name: "risk_alerts" })
export class RiskAlert {
  @PrimaryGeneratedColumn({ name: "id", type: "bigint" })
  public readonly id!: string;

  @Index()
  @Column({ name: "transaction_ref", type: "varchar" })
  public readonly transactionRef!: string;

  @Index()
  @Column({ name: "sender", type: "varchar" })
  public readonly sender!: string;

  @Index()
  @Column({ name: "recipient", type: "varchar" })
  public readonly recipient!: string;

  @Column({ name: "amount", type: "numeric", precision: 78, scale: 0, transformer: bigIntTransformer })
  public readonly amount!: bigint;

  @Column({ name: "risk_score", type: "smallint" })
  public readonly riskScore!: number;

  @Column({ name: "severity", type: "varchar" })
  public readonly severity!: Severity;

  @Column({ name: "alert_kind", type: "varchar" })
  public readonly alertKind!: AlertKind;

  @Column({ name: "message", type: "text" })
  public readonly message!: string;

  @Column({ name: "ai_applied", type: "boolean", default: false })
  public readonly aiApplied!: boolean;

  @Column({ name: "occurred_at", type: "timestamptz" })
  public readonly occurredAt!: Date;

  @CreateDateColumn({ name: "created_at", type: "timestamptz" })
  public readonly createdAt!: Date;
}
