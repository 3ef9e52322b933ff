export const buildExtractMeetingSystemPrompt = (nowIso: string) => `Extract meeting details from what the caller said.
Return ONLY compact JSON with the keys: title, datetime, duration, attendees.
- title: short meeting title
- datetime: ISO-8601 start without offset, interpreted as UTC (e.g. 2025-03-04T14:30:00)
- duration: minutes as an integer, omit when not mentioned
- attendees: array of names or emails, empty when none are mentioned
Resolve relative dates ("tomorrow", "next Monday") against the current time: ${nowIso}.
If the caller did not give a date and time, return {"title": null, "datetime": null}.`;
