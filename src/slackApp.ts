import { App, LogLevel, type BlockButtonAction, type ButtonAction, type KnownBlock, type RespondFn } from "@slack/bolt";
import type { FileStore } from "./storage/fileStore.js";
import type { Ledger } from "./ledger.js";
import type { InvitationBroker } from "./invitations.js";
import type { SessionManager } from "./sessions.js";
import type { GameEvents } from "./events.js";
import type { Invitation } from "./types.js";
import { CONFIG } from "./config.js";
import { GameError } from "./errors.js";
import { canCover, creditByOperator, debitByOperator, getBalance, syncFunding, type FundingSource } from "./economy.js";
import { runOnce } from "./idempotency.js";
import { errMessage, logger } from "./logger.js";
import { systemClock, type Clock } from "./time.js";
import {
    describeError,
    parseAdjustArgs,
    parseChallengeArgs,
    parseIdArg,
    parseMoveArgs,
    pickSession,
} from "./commands.js";
import {
    challengeText,
    gamesText,
    helpText,
    mention,
    moveText,
    outcomeText,
    sessionStartedText,
    statusText,
    transactionsText,
} from "./render.js";

export type ArcadeServices = {
    store: FileStore;
    ledger: Ledger;
    invitations: InvitationBroker;
    sessions: SessionManager;
    events: GameEvents;
    funding?: FundingSource;
    /** Slack user ids allowed to use /fund and /withdraw. */
    operators?: readonly string[];
    clock?: Clock;
};

const ACTION_DEDUPE_MS = 10 * 60_000;

const log = logger.child({ component: "slack" });

function section(text: string): KnownBlock {
    return { type: "section", text: { type: "mrkdwn", text } };
}

function answerBlocks(inv: Invitation): KnownBlock[] {
    return [
        section(challengeText(inv)),
        {
            type: "actions",
            elements: [
                { type: "button", text: { type: "plain_text", text: "Accept" }, style: "primary", action_id: "invite_accept", value: inv.id },
                { type: "button", text: { type: "plain_text", text: "Decline" }, style: "danger", action_id: "invite_decline", value: inv.id },
            ],
        },
    ];
}

async function replyError(respond: RespondFn, e: unknown) {
    if (!(e instanceof GameError)) log.error("Command failed", { error: errMessage(e) });
    await respond({ response_type: "ephemeral", text: describeError(e) });
}

export function buildSlackApp(services: ArcadeServices) {
    const { store, ledger, invitations, sessions, events, funding } = services;
    const clock = services.clock ?? systemClock;
    const operators = services.operators ?? CONFIG.operatorIds;

    const app = new App({
        token: CONFIG.slack.botToken,
        socketMode: true,
        appToken: CONFIG.slack.appToken,
        signingSecret: CONFIG.slack.signingSecret,
        logLevel: LogLevel.WARN,
    });

    // root message per invitation; session updates go in its thread
    const threads = new Map<string, string>();

    async function post(channel: string | undefined, text: string, threadOf?: string) {
        if (!channel) return;
        const thread_ts = threadOf ? threads.get(threadOf) : undefined;
        await app.client.chat.postMessage({ channel, text, thread_ts });
    }

    events.on("invitation.created", async (inv) => {
        if (!inv.channel) return;
        const root = await app.client.chat.postMessage({
            channel: inv.channel,
            text: challengeText(inv),
            blocks: [section(challengeText(inv))],
        });
        if (root.ts) threads.set(inv.id, root.ts);

        await app.client.chat.postEphemeral({
            channel: inv.channel,
            user: inv.challengedId,
            text: `${challengeText(inv)} Accept or decline below, or use \`/accept ${inv.id}\`.`,
            blocks: answerBlocks(inv),
        });
    });

    events.on("invitation.declined", async (inv) => {
        const why = inv.reason === "InsufficientFunds" ? " (a stake could not be covered)" : "";
        await post(inv.channel, `:x: ${mention(inv.challengedId)} declined the challenge${why}.`, inv.id);
        threads.delete(inv.id);
    });

    events.on("invitation.expired", async (inv) => {
        await post(inv.channel, `:hourglass: The challenge to ${mention(inv.challengedId)} expired.`, inv.id);
        threads.delete(inv.id);
    });

    events.on("session.started", async (session) => {
        await post(session.channel, sessionStartedText(session), session.invitationId);
    });

    events.on("session.moved", async (session) => {
        if (session.status !== "active") return;
        await post(session.channel, moveText(session), session.invitationId);
    });

    events.on("session.ended", async (session, settlement) => {
        await post(session.channel, `${moveText(session)}\n${outcomeText(session, settlement)}`, session.invitationId);
        threads.delete(session.invitationId);
    });

    app.command("/challenge", async ({ ack, respond, command }) => {
        await ack();
        const parsed = parseChallengeArgs(command.text);
        if (!parsed.ok) {
            await respond({ response_type: "ephemeral", text: parsed.error });
            return;
        }
        try {
            await syncFunding(ledger, funding, [command.user_id]);
            const can = canCover(ledger, command.user_id, parsed.stake);
            if (!can.ok) {
                await respond({ response_type: "ephemeral", text: can.reason ?? "Not enough available balance." });
                return;
            }
            const inv = await invitations.create(command.user_id, parsed.opponentId, parsed.kind, parsed.stake, {
                channel: command.channel_id,
            });
            await respond({ response_type: "ephemeral", text: `Challenge sent. It expires in ${CONFIG.inviteTtlSec}s. Id: \`${inv.id}\`` });
        } catch (e) {
            await replyError(respond, e);
        }
    });

    app.command("/accept", async ({ ack, respond, command }) => {
        await ack();
        const parsed = parseIdArg(command.text, "Usage: /accept <challenge id>");
        if (!parsed.ok) {
            await respond({ response_type: "ephemeral", text: parsed.error });
            return;
        }
        try {
            await invitations.accept(parsed.id, command.user_id);
        } catch (e) {
            await replyError(respond, e);
        }
    });

    app.command("/decline", async ({ ack, respond, command }) => {
        await ack();
        const parsed = parseIdArg(command.text, "Usage: /decline <challenge id>");
        if (!parsed.ok) {
            await respond({ response_type: "ephemeral", text: parsed.error });
            return;
        }
        try {
            await invitations.decline(parsed.id, command.user_id);
        } catch (e) {
            await replyError(respond, e);
        }
    });

    // Slack retries interactive payloads; each (action, timestamp) pair runs once
    async function answer(action: ButtonAction, userId: string, respond: RespondFn, accept: boolean) {
        const key = `slack:${action.action_id}:${action.action_ts}:${userId}`;
        const invitationId = action.value ?? "";
        try {
            const run = await runOnce(
                store,
                key,
                async () => {
                    if (accept) await invitations.accept(invitationId, userId);
                    else await invitations.decline(invitationId, userId);
                },
                { now: clock(), ttlMs: ACTION_DEDUPE_MS }
            );
            if (!run.ok) return;
            await respond({ delete_original: true });
        } catch (e) {
            await replyError(respond, e);
        }
    }

    app.action<BlockButtonAction>("invite_accept", async ({ ack, body, action, respond }) => {
        await ack();
        await answer(action, body.user.id, respond, true);
    });

    app.action<BlockButtonAction>("invite_decline", async ({ ack, body, action, respond }) => {
        await ack();
        await answer(action, body.user.id, respond, false);
    });

    app.command("/move", async ({ ack, respond, command }) => {
        await ack();
        const parsed = parseMoveArgs(command.text);
        if (!parsed.ok) {
            await respond({ response_type: "ephemeral", text: parsed.error });
            return;
        }
        const target = pickSession(sessions.activeFor(command.user_id), parsed.sessionId);
        if (!target.ok) {
            await respond({ response_type: "ephemeral", text: target.error });
            return;
        }
        try {
            const { session } = await sessions.submitMove(target.session.id, command.user_id, parsed.command);
            // the channel gets the board through session.moved; DMs have no channel stored
            if (!session.channel) await respond({ response_type: "ephemeral", text: moveText(session) });
        } catch (e) {
            await replyError(respond, e);
        }
    });

    app.command("/status", async ({ ack, respond, command }) => {
        await ack();
        const text = statusText(sessions.activeFor(command.user_id), invitations.listPendingFor(command.user_id));
        await respond({ response_type: "ephemeral", text });
    });

    app.command("/balance", async ({ ack, respond, command }) => {
        await ack();
        const userId = command.user_id;
        try {
            await syncFunding(ledger, funding, [userId]);
        } catch (e) {
            log.warn("Funding sync failed", { userId, error: errMessage(e) });
        }
        const { available, held } = getBalance(ledger, userId);
        await respond({
            response_type: "ephemeral",
            blocks: [
                section(`*Available:* \`${available}\``),
                { type: "context", elements: [{ type: "mrkdwn", text: `Held in live games: *${held}*` }] },
            ],
            text: `Available ${available}, held ${held}`,
        });
    });

    app.command("/transactions", async ({ ack, respond, command }) => {
        await ack();
        await respond({ response_type: "ephemeral", text: transactionsText(ledger.history(command.user_id)) });
    });

    app.command("/games", async ({ ack, respond }) => {
        await ack();
        await respond({ response_type: "ephemeral", text: gamesText(CONFIG.minStake, CONFIG.maxStake) });
    });

    app.command("/help", async ({ ack, respond, command }) => {
        await ack();
        await respond({ response_type: "ephemeral", text: helpText(operators.includes(command.user_id)) });
    });

    // trigger_id is unique per invocation, so a retried request applies once
    app.command("/fund", async ({ ack, respond, command }) => {
        await ack();
        const parsed = parseAdjustArgs(command.text, "Usage: /fund @user <amount>");
        if (!parsed.ok) {
            await respond({ response_type: "ephemeral", text: parsed.error });
            return;
        }
        try {
            const tx = await creditByOperator(ledger, operators, {
                operatorId: command.user_id,
                targetId: parsed.userId,
                amount: parsed.amount,
                requestId: command.trigger_id,
            });
            const text = tx
                ? `Credited ${parsed.amount} to ${mention(parsed.userId)}. Available now ${tx.availableAfter}.`
                : "That request was already applied.";
            await respond({ response_type: "ephemeral", text });
        } catch (e) {
            await replyError(respond, e);
        }
    });

    app.command("/withdraw", async ({ ack, respond, command }) => {
        await ack();
        const parsed = parseAdjustArgs(command.text, "Usage: /withdraw @user <amount>");
        if (!parsed.ok) {
            await respond({ response_type: "ephemeral", text: parsed.error });
            return;
        }
        try {
            const tx = await debitByOperator(ledger, operators, {
                operatorId: command.user_id,
                targetId: parsed.userId,
                amount: parsed.amount,
                requestId: command.trigger_id,
            });
            const text = tx
                ? `Debited ${parsed.amount} from ${mention(parsed.userId)}. Available now ${tx.availableAfter}.`
                : "That request was already applied.";
            await respond({ response_type: "ephemeral", text });
        } catch (e) {
            await replyError(respond, e);
        }
    });

    return app;
}

export async function startSlackApp(app: ReturnType<typeof buildSlackApp>) {
    const port = CONFIG.slack.port;
    await app.start({ port });
    log.info("Slack app running (socket mode)", { port });
}
