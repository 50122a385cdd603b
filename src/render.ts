import { GAME_LABELS, commandsFor, maxTurnsFor, renderBoard, type GameKind } from "./games/index.js";
import { playerAt } from "./sessions.js";
import { fromIso } from "./time.js";
import type { Invitation, Session, SettlementRecord, Transaction, TransactionType } from "./types.js";

export function mention(userId: string): string {
    return `<@${userId}>`;
}

export function challengeText(inv: Invitation): string {
    return `${mention(inv.challengerId)} challenged ${mention(inv.challengedId)} to *${GAME_LABELS[inv.kind]}* for *${inv.stake}*.`;
}

export function boardBlock(session: Session): string {
    return "```\n" + renderBoard(session.board) + "\n```";
}

export function turnLine(session: Session): string {
    const verbs = commandsFor(session.kind).join(" | ");
    return `Turn ${session.turnCount}/${session.maxTurns}. ${mention(playerAt(session, session.turnOwner))} to move: \`/move ${verbs}\``;
}

export function sessionStartedText(session: Session): string {
    return [
        `*${GAME_LABELS[session.kind]}* is on: ${mention(session.playerA)} vs ${mention(session.playerB)}, ${session.stake} each held.`,
        `Game id: \`${session.id}\``,
        boardBlock(session),
        turnLine(session),
    ].join("\n");
}

export function moveText(session: Session): string {
    return session.status === "active" ? `${boardBlock(session)}\n${turnLine(session)}` : boardBlock(session);
}

export function outcomeText(session: Session, settlement: SettlementRecord): string {
    const label = GAME_LABELS[session.kind];
    switch (settlement.outcome) {
        case "Tie":
            return `*${label}* ended in a tie. Both stakes of ${session.stake} were returned.`;
        case "ForfeitA":
        case "ForfeitB": {
            const idle = settlement.outcome === "ForfeitA" ? session.playerA : session.playerB;
            return `${mention(idle)} ran out of time. ${mention(settlement.payoutTo ?? "")} wins *${settlement.amountTransferred}*.`;
        }
        case "WinA":
        case "WinB":
            return `*${label}* is over. ${mention(settlement.payoutTo ?? "")} wins *${settlement.amountTransferred}*.`;
    }
}

export function statusText(sessions: Session[], pending: Invitation[]): string {
    if (sessions.length === 0 && pending.length === 0) return "No active games or pending challenges.";
    const lines: string[] = [];
    for (const s of sessions) {
        lines.push(`*${GAME_LABELS[s.kind]}* \`${s.id}\` vs stake ${s.stake}`, moveText(s));
    }
    for (const inv of pending) {
        lines.push(`Pending: ${challengeText(inv)} Answer with \`/accept ${inv.id}\` or \`/decline ${inv.id}\`.`);
    }
    return lines.join("\n");
}

const GAME_BLURBS: Record<GameKind, string> = {
    puzzle: "Stack falling pieces and clear lines. Topping out loses.",
    survival: "Steer a snake, eat food, avoid walls and your opponent.",
    paddle_ball: "Return the ball with your paddle. First to 11 wins.",
};

const GAME_KEYWORDS: Record<GameKind, string> = {
    puzzle: "puzzle",
    survival: "survival",
    paddle_ball: "paddle",
};

export function gamesText(minStake: number, maxStake: number): string {
    const kinds: GameKind[] = ["puzzle", "survival", "paddle_ball"];
    const lines = ["*Games*"];
    for (const kind of kinds) {
        lines.push(
            `*${GAME_LABELS[kind]}* (\`${GAME_KEYWORDS[kind]}\`): ${GAME_BLURBS[kind]} ` +
                `Moves: ${commandsFor(kind).join(", ")}. Ends after ${maxTurnsFor(kind)} moves at most.`
        );
    }
    lines.push(`Stakes from ${minStake} to ${maxStake}. Start one with \`/challenge @user <game> <stake>\`.`);
    return lines.join("\n");
}

export function helpText(operator = false): string {
    const lines = [
        "`/challenge @user <game> <stake>` challenge someone",
        "`/accept <id>` or `/decline <id>` answer a challenge",
        "`/move <command> [game id]` play your turn",
        "`/status` your games and pending challenges",
        "`/balance` available and held funds",
        "`/transactions` your last 10 ledger entries",
        "`/games` the games and their moves",
    ];
    if (operator) {
        lines.push("`/fund @user <amount>` credit funds received outside the bot", "`/withdraw @user <amount>` debit funds paid out");
    }
    return lines.join("\n");
}

const TX_LABELS: Record<TransactionType, string> = {
    deposit: "Deposit",
    withdrawal: "Withdrawal",
    hold: "Stake held",
    release: "Stake released",
    payout: "Winnings",
    loss: "Stake lost",
    refund: "Stake refunded",
};

export function transactionsText(txs: Transaction[]): string {
    if (txs.length === 0) return "No transactions yet.";
    return txs
        .map((t) => {
            const when = fromIso(t.createdAt).toFormat("yyyy-LL-dd HH:mm");
            const signed = t.amount > 0 ? `+${t.amount}` : String(t.amount);
            return `${when} ${TX_LABELS[t.type]} ${signed} (available ${t.availableAfter}, held ${t.heldAfter})`;
        })
        .join("\n");
}
