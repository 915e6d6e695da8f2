type DateInput = Date | string | number;

function toDate(input?: DateInput) {
  if (input instanceof Date) return input;
  return new Date(input ?? Date.now());
}

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

export function formatLongDate(input?: DateInput) {
  return toDate(input)
    .toLocaleDateString("en-US", {
      weekday: "long",
      month: "long",
      day: "numeric",
    })
    .toUpperCase();
}

export function formatWeekday(input?: DateInput) {
  return WEEKDAYS[toDate(input).getDay()] ?? "";
}

export function formatClock(input?: DateInput) {
  const date = toDate(input);
  return `${String(date.getHours()).padStart(2, "0")}:${String(date.getMinutes()).padStart(2, "0")}`;
}

// H:MM, rounded to the minute
export function formatDuration(ms: number) {
  const minutes = Math.round(Math.abs(ms) / 60_000);
  const sign = ms < 0 && minutes > 0 ? "-" : "";
  return `${sign}${Math.floor(minutes / 60)}:${String(minutes % 60).padStart(2, "0")}`;
}

export function formatSignedDuration(ms: number) {
  const text = formatDuration(ms);
  return text.startsWith("-") ? text : `+${text}`;
}
