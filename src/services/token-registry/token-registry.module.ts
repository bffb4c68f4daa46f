import { Module } from '@nestjs/common';
import { ModelsModule } from '../../models/models.module';
import { TokenRegistryService } from './token-registry.service';
import { TOKEN_REGISTRY } from './token-registry.interface';

@Module({
  imports: [ModelsModule],
  providers: [
    TokenRegistryService,
    { provide: TOKEN_REGISTRY, useExisting: TokenRegistryService },
  ],
  exports: [TokenRegistryService, TOKEN_REGISTRY],
})
export class TokenRegistryModule {}
