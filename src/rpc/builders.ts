import { RequestEnvelope, idField, type JsonRpcId, type RequestParams } from "./protocol.js";

/** Builds an outbound call. The id defaults to `null`. */
export class RequestBuilder {
  private id: JsonRpcId = null;
  private params: RequestParams | undefined;

  constructor(private readonly method: string) {}

  withId(id: JsonRpcId): this {
    this.id = id;
    return this;
  }

  withParams(params: RequestParams): this {
    this.params = params;
    return this;
  }

  finish(): RequestEnvelope {
    return new RequestEnvelope(this.method, this.params, idField(this.id));
  }
}

/** Builds an outbound notification (no `id` member at all). */
export class NotificationBuilder {
  private params: RequestParams | undefined;

  constructor(private readonly method: string) {}

  withParams(params: RequestParams): this {
    this.params = params;
    return this;
  }

  finish(): RequestEnvelope {
    return new RequestEnvelope(this.method, this.params, idField(undefined));
  }
}

export function request(method: string): RequestBuilder {
  return new RequestBuilder(method);
}

export function notification(method: string): NotificationBuilder {
  return new NotificationBuilder(method);
}
