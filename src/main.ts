import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ConfigurationService } from './config/configuration.service';
import { LoggerService } from './common/logger/logger.service';
import { configureApp } from './app.setup';

async function bootstrap(): Promise<void> {
  try {
    const app = await NestFactory.create(AppModule, {
      bufferLogs: true,
    });

    const configService = app.get(ConfigurationService);
    const loggerService = app.get(LoggerService);

    configService.validateConfiguration();
    loggerService.log('Configuration validated successfully', 'Bootstrap');

    app.useLogger(loggerService);

    app.enableCors({
      origin: configService.frontendUrl,
      methods: 'GET,HEAD,POST',
      credentials: false,
    });

    configureApp(app);

    const swaggerConfig = new DocumentBuilder()
      .setTitle('Invoice Validation API')
      .setDescription('Checks extracted invoice data for missing values, data types and arithmetic consistency')
      .setVersion('1.0')
      .build();
    SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, swaggerConfig));

    const port = configService.port;
    await app.listen(port);

    loggerService.log(`Application started successfully on port ${port}`, 'Bootstrap', {
      port,
      frontendUrl: configService.frontendUrl,
      environment: process.env.NODE_ENV || 'development',
    });
  } catch (error) {
    console.error('Failed to start application:', error);
    process.exit(1);
  }
}

void bootstrap();
