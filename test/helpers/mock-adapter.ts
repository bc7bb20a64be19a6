import type {
  ChannelAdapter,
  ChannelEvents,
  SendImageParams,
  SendTextParams,
} from "../../src/channels/adapter.js";
import { TypedEventEmitter } from "../../src/utils/typed-emitter.js";

export type MockCall =
  | { readonly method: "start" | "stop"; readonly args: [] }
  | { readonly method: "sendText"; readonly args: [SendTextParams] }
  | { readonly method: "sendImage"; readonly args: [SendImageParams] }
  | { readonly method: "sendTyping"; readonly args: [{ to: string }] };

export class MockAdapter implements ChannelAdapter {
  readonly id: string;
  readonly label: string;
  readonly events = new TypedEventEmitter<ChannelEvents>();
  readonly calls: MockCall[] = [];

  private messageCounter = 0;

  constructor(id = "mock", label = "Mock Channel") {
    this.id = id;
    this.label = label;
  }

  async start(_token: string, _signal: AbortSignal): Promise<void> {
    this.calls.push({ method: "start", args: [] });
    this.events.emit("connected");
  }

  async stop(): Promise<void> {
    this.calls.push({ method: "stop", args: [] });
    this.events.emit("disconnected", "stopped");
  }

  async sendText(params: SendTextParams): Promise<{ messageId: string }> {
    this.calls.push({ method: "sendText", args: [params] });
    return { messageId: `mock-${++this.messageCounter}` };
  }

  async sendImage(params: SendImageParams): Promise<{ messageId: string }> {
    this.calls.push({ method: "sendImage", args: [params] });
    return { messageId: `mock-${++this.messageCounter}` };
  }

  async sendTyping(params: { to: string }): Promise<void> {
    this.calls.push({ method: "sendTyping", args: [params] });
  }

  texts(to?: string): SendTextParams[] {
    return this.calls.flatMap((c) =>
      c.method === "sendText" && (to === undefined || c.args[0].to === to) ? [c.args[0]] : [],
    );
  }

  images(to?: string): SendImageParams[] {
    return this.calls.flatMap((c) =>
      c.method === "sendImage" && (to === undefined || c.args[0].to === to) ? [c.args[0]] : [],
    );
  }
}
