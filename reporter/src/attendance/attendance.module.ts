import { Module } from '@nestjs/common';
import { AliasResolverService } from './alias-resolver.service';
import { IdentityClassifierService } from './identity-classifier.service';

@Module({
  providers: [IdentityClassifierService, AliasResolverService],
  exports: [IdentityClassifierService, AliasResolverService],
})
export class AttendanceModule {}
