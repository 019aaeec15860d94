import type { IntentKind, Order, OverlayPayload, PatientContext } from "./orders/types";

export type ClientToServerMessage =
  | {
      type: "join";
      encounterId: string;
    }
  | {
      type: "set_patient";
      patient: PatientContext | null;
    }
  | {
      type: "note_opened";
    }
  | {
      type: "note_closed";
    }
  | {
      type: "utterance";
      /** Finalized transcript from the recognizer. */
      text: string;
    }
  | {
      type: "ping";
    };

export type ServerToClientMessage =
  | {
      type: "joined";
      encounterId: string;
    }
  | {
      type: "feedback";
      text: string;
      overlay?: OverlayPayload;
      intent: IntentKind;
    }
  | {
      type: "speak";
      text: string;
    }
  | {
      type: "plan_line";
      text: string;
    }
  | {
      type: "queue";
      patientId: string | null;
      orders: readonly Order[];
      persistenceHealthy: boolean;
    }
  | {
      type: "error";
      message: string;
    }
  | {
      type: "pong";
    };

/** What the gateway needs from a connected headset; the transport adapts a ws socket to this. */
export interface ClientConnection {
  send(msg: ServerToClientMessage): void;
  close(): void;
}
