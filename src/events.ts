import { EventEmitter } from "events";
import type { Invitation, MoveLogEntry, Session, SettlementRecord } from "./types.js";
import { errMessage, logger } from "./logger.js";

export type ArcadeEvents = {
    "invitation.created": [invitation: Invitation];
    "invitation.accepted": [invitation: Invitation, session: Session];
    "invitation.declined": [invitation: Invitation];
    "invitation.expired": [invitation: Invitation];
    "session.started": [session: Session];
    "session.moved": [session: Session, move: MoveLogEntry];
    "session.ended": [session: Session, settlement: SettlementRecord];
};

export type ArcadeEventName = keyof ArcadeEvents;

type Listener<K extends ArcadeEventName> = (...args: ArcadeEvents[K]) => void | Promise<void>;

const log = logger.child({ component: "events" });

/**
 * Outbound notifications for the transport. Listeners run after the state
 * change is committed; a failing listener is logged and never reaches the core.
 */
export class GameEvents {
    private readonly emitter = new EventEmitter();

    on<K extends ArcadeEventName>(event: K, listener: Listener<K>): () => void {
        const wrapped = (...args: ArcadeEvents[K]) => {
            void Promise.resolve()
                .then(() => listener(...args))
                .catch((e: unknown) => log.error("Event listener failed", { event, error: errMessage(e) }));
        };
        this.emitter.on(event, wrapped);
        return () => {
            this.emitter.off(event, wrapped);
        };
    }

    emit<K extends ArcadeEventName>(event: K, ...args: ArcadeEvents[K]) {
        log.debug("Event", { event });
        this.emitter.emit(event, ...args);
    }
}
