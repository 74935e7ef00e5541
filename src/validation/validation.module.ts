import { Module } from '@nestjs/common';
import { ServicesModule } from '../services/services.module';
import { ValidationController } from './validation.controller';

@Module({
  imports: [ServicesModule],
  controllers: [ValidationController],
})
export class ValidationModule {}
