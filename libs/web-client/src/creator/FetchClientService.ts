import { Injectable } from '@nestjs/common';
import { FetchClient } from '../FetchClient';
import { WebClient } from '../http/WebClient';
import { WebClientService } from './WebClientService';

@Injectable()
export class FetchClientService extends WebClientService {
  create(url: string): WebClient {
    return new FetchClient(url);
  }
}
