import { Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { APP_FILTER } from "@nestjs/core";
import { TypeOrmModule, TypeOrmModuleOptions } from "@nestjs/typeorm";
import { PostgresConnectionOptions } from "typeorm/driver/postgres/PostgresConnectionOptions";
import { AddressController } from "./address/address.controller";
import { AdminController } from "./admin/admin.controller";
import { AiRiskBlendService } from "./ai-risk/aiRiskBlend.service";
import { RiskErrorsFilter } from "./common/filters/riskErrors.filter";
import config from "./config";
import { RiskDetectorService } from "./detector/riskDetector.service";
import { PatternFindingRecord, RiskAlert } from "./entities";
import { EventsController } from "./events/events.controller";
import { RiskEventPublisher } from "./events/riskEventPublisher.service";
import { CreateRiskEvents1759100000000 } from "./migrations/1759100000000-CreateRiskEvents";
import { PatternFindingRepository, RiskAlertRepository } from "./repositories";
import { TransactionController } from "./transaction/transaction.controller";
import { WatchlistController } from "./watchlist/watchlist.controller";

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [config] }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService): TypeOrmModuleOptions => ({
        ...configService.getOrThrow<PostgresConnectionOptions>("typeORM"),
        entities: [RiskAlert, PatternFindingRecord],
        migrations: [CreateRiskEvents1759100000000],
        migrationsTableName: "migrations",
        logging: false,
      }),
    }),
    TypeOrmModule.forFeature([RiskAlert, PatternFindingRecord]),
  ],
  controllers: [TransactionController, AddressController, AdminController, WatchlistController, EventsController],
  providers: [
    RiskAlertRepository,
    PatternFindingRepository,
    AiRiskBlendService,
    RiskEventPublisher,
    RiskDetectorService,
    { provide: APP_FILTER, useClass: RiskErrorsFilter },
  ],
})
export class AppModule {}
