import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateRiskEvents1759100000000 implements MigrationInterface {
  name = "CreateRiskEvents1759100000000";

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "risk_alerts" (
        "id" BIGSERIAL NOT NULL,
        "transaction_ref" character varying NOT NULL,
        "sender" character varying NOT NULL,
        "recipient" character varying NOT NULL,
        "amount" numeric(78,0) NOT NULL,
        "risk_score" smallint NOT NULL,
        "severity" character varying NOT NULL,
        "alert_kind" character varying NOT NULL,
        "message" text NOT NULL,
        "ai_applied" boolean NOT NULL DEFAULT false,
        "occurred_at" TIMESTAMP WITH TIME ZONE NOT NULL,
        "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_risk_alerts" PRIMARY KEY ("id")
      );
    `);

    await queryRunner.query(`CREATE INDEX "IDX_risk_alerts_transaction_ref" ON "risk_alerts" ("transaction_ref")`);
    await queryRunner.query(`CREATE INDEX "IDX_risk_alerts_sender" ON "risk_alerts" ("sender")`);
    await queryRunner.query(`CREATE INDEX "IDX_risk_alerts_recipient" ON "risk_alerts" ("recipient")`);

    await queryRunner.query(`
      CREATE TABLE "pattern_findings" (
        "id" BIGSERIAL NOT NULL,
        "address" character varying NOT NULL,
        "transaction_ref" character varying,
        "pattern_kind" character varying NOT NULL,
        "severity" character varying NOT NULL,
        "description" text NOT NULL,
        "evidence_ids" jsonb NOT NULL DEFAULT '[]'::jsonb,
        "score_contribution" smallint NOT NULL,
        "detected_at" TIMESTAMP WITH TIME ZONE NOT NULL,
        "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_pattern_findings" PRIMARY KEY ("id")
      );
    `);

    await queryRunner.query(`CREATE INDEX "IDX_pattern_findings_address" ON "pattern_findings" ("address")`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "public"."IDX_pattern_findings_address"`);
    await queryRunner.query(`DROP TABLE "pattern_findings"`);
    await queryRunner.query(`DROP INDEX "public"."IDX_risk_alerts_recipient"`);
    await queryRunner.query(`DROP INDEX "public"."IDX_risk_alerts_sender"`);
    await queryRunner.query(`DROP INDEX "public"."IDX_risk_alerts_transaction_ref"`);
    await queryRunner.query(`DROP TABLE "risk_alerts"`);
  }
}
