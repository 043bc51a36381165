import { Module } from '@nestjs/common';
import { ParticipantsFileReader } from './participants-file.reader';
import { ReportFileWriter } from './report-file.writer';

@Module({
  providers: [ParticipantsFileReader, ReportFileWriter],
  exports: [ParticipantsFileReader, ReportFileWriter],
})
export class IngestModule {}
