import type {
  PushRequest,
  PushSingleResponse,
  PushSyncResponse
} from '../domain/models';

export interface PushClient {
  pushSync(target: string, request: PushRequest, signal?: AbortSignal): Promise<PushSyncResponse>;
  pushSingle(
    targets: string[],
    request: PushRequest,
    signal?: AbortSignal
  ): Promise<PushSingleResponse>;
}
