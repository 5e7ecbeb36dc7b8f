import { Injectable } from '@nestjs/common';
import {
  RELEVANCY_SCORING_VERSION,
  RERANK_VERSION,
  SERVICE_NAME,
} from './ranking/config/ranking.constants';

@Injectable()
export class AppService {
  getInfo(): {
    service: string;
    version: string;
    rerankVersion: string;
    relevancyScoringVersion: string;
  } {
    return {
      service: SERVICE_NAME,
      version: '1.0.0',
      rerankVersion: RERANK_VERSION,
      relevancyScoringVersion: RELEVANCY_SCORING_VERSION,
    };
  }
}
