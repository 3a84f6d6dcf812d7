import "reflect-metadata";
import { Logger, ValidationPipe } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";

async function bootstrap() {
  const logger = new Logger("WalletRiskWorker");
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder().setTitle("Wallet risk engine").setVersion("1.0").build()
  );
  SwaggerModule.setup("docs", app, document);

  const port = configService.get<number>("port") ?? 3001;
  await app.listen(port);
  logger.log({ port }, "Wallet risk worker listening");
}

bootstrap().catch((error: unknown) => {
  new Logger("WalletRiskWorker").error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
