import { Injectable } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { PatternFinding } from "risk-scoring";
import { Repository } from "typeorm";
import { PatternFindingRecord } from "../entities";

@Injectable()
export class PatternFindingRepository {
  public constructor(
    @InjectRepository(PatternFindingRecord) private readonly repository: Repository<PatternFindingRecord>
  ) {}

  public async addFindings(findings: PatternFinding[], transactionRef?: string): Promise<void> {
    if (!findings.length) {
      return;
    }

    await this.repository.insert(
      findings.map((finding) => ({
        address: finding.address,
        transactionRef: transactionRef ?? null,
        patternKind: finding.patternKind,
        severity: finding.severity,
        description: finding.description,
        evidenceIds: finding.evidenceIds,
        scoreContribution: finding.scoreContribution,
        detectedAt: new Date(finding.detectedAt),
      }))
    );
  }
}
