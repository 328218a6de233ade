import {
	DAY_MS,
	assertTimeZone,
	exchangeTimeToUtc,
	startOfDay,
	timeOfDay,
	utcToExchangeTime,
} from "@barline/core";
import type {
	ExchangeCalendar,
	ScheduleSettings,
	TradingSession,
} from "@barline/core";

const SEARCH_DAYS = 14;

/**
 * Exchange calendar built from fixed daily sessions.
 *
 * Intraday bars are aligned to the start of the session they open in, and the
 * last bar of a session is due at the session end even when it is shorter
 * than the period.
 */
export class SessionSchedule implements ExchangeCalendar {
	readonly timeZone: string;
	readonly safetyMarginMs: number;

	private readonly sessions: TradingSession[];
	private readonly tradingDays: ReadonlySet<number>;

	constructor(settings: ScheduleSettings) {
		if (settings.sessions.length === 0) {
			throw new Error("SessionSchedule needs at least one session");
		}
		assertTimeZone(settings.timeZone);

		this.timeZone = settings.timeZone;
		this.safetyMarginMs = settings.safetyMarginMs;
		this.sessions = [...settings.sessions].sort((a, b) => a.start - b.start);
		this.tradingDays = new Set(settings.tradingDays);
	}

	/**
	 * @throws Error when no trading session starts within two weeks of `now`
	 */
	nextBarOpen(now: number, periodMs: number): number {
		const today = startOfDay(now);

		if (periodMs >= DAY_MS) {
			const firstDay = now < today + this.lastSessionEnd() ? 0 : 1;
			for (let offset = firstDay; offset <= SEARCH_DAYS; offset += 1) {
				const day = today + offset * DAY_MS;
				if (this.isTradingDay(day)) {
					return day;
				}
			}
			return this.noSession(now);
		}

		for (let offset = 0; offset <= SEARCH_DAYS; offset += 1) {
			const day = today + offset * DAY_MS;
			if (!this.isTradingDay(day)) {
				continue;
			}
			for (const session of this.sessions) {
				const start = day + session.start;
				const end = day + session.end;
				if (now >= start && now < end) {
					return start + Math.floor((now - start) / periodMs) * periodMs;
				}
				if (start > now) {
					return start;
				}
			}
		}
		return this.noSession(now);
	}

	requestTimeFor(barOpen: number, periodMs: number): number {
		if (periodMs >= DAY_MS) {
			const lastDay = startOfDay(barOpen + periodMs - DAY_MS);
			return lastDay + this.lastSessionEnd();
		}

		const day = startOfDay(barOpen);
		const time = timeOfDay(barOpen);
		const session = this.sessions.find(
			(candidate) => time >= candidate.start && time < candidate.end
		);
		const due = barOpen + periodMs;
		return session ? Math.min(due, day + session.end) : due;
	}

	toExchangeTime(utcMs: number): number {
		return utcToExchangeTime(utcMs, this.timeZone);
	}

	toUtc(wallMs: number): number {
		return exchangeTimeToUtc(wallMs, this.timeZone);
	}

	private isTradingDay(day: number): boolean {
		return this.tradingDays.has(new Date(day).getUTCDay());
	}

	private lastSessionEnd(): number {
		return Math.max(...this.sessions.map((session) => session.end));
	}

	private noSession(now: number): never {
		throw new Error(
			`No trading session within ${SEARCH_DAYS} days of ${new Date(now).toISOString()}`
		);
	}
}
