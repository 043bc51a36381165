import { Module } from '@nestjs/common';
import { AttendanceModule } from '../attendance/attendance.module';
import { IngestModule } from '../ingest/ingest.module';
import { ReportPivotService } from './report-pivot.service';
import { ReportRunnerService } from './report-runner.service';

@Module({
  imports: [AttendanceModule, IngestModule],
  providers: [ReportPivotService, ReportRunnerService],
  exports: [ReportRunnerService],
})
export class ReportsModule {}
