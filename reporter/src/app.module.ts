import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import attendanceConfig from './config/attendance.config';
import { ReportsModule } from './reports/reports.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [attendanceConfig],
    }),
    ReportsModule,
  ],
})
export class AppModule {}
