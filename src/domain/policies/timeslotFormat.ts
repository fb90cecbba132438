import { format } from "date-fns";

// strftime-директива → токен date-fns.
const STRFTIME_TOKENS: Record<string, string> = {
  H: "HH",
  I: "hh",
  M: "mm",
  S: "ss",
  p: "a",
  y: "yy",
  Y: "yyyy",
  m: "MM",
  d: "dd",
  a: "EEE",
  A: "EEEE",
  b: "MMM",
  B: "MMMM",
};

/**
 * Policy: перевести strftime-шаблон (`%I:%M %p`) в шаблон date-fns (`hh':'mm' 'a`).
 *
 * Литералы всегда берутся в кавычки: иначе date-fns воспримет буквы как токены.
 * Неизвестная директива остаётся литералом как есть (`%Q` → `%Q`).
 */
export function strftimeToDateFns(pattern: string): string {
  let out = "";
  let literal = "";
  const flush = () => {
    if (!literal) return;
    out += `'${literal.replace(/'/g, "''")}'`;
    literal = "";
  };

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch !== "%" || i === pattern.length - 1) {
      literal += ch;
      continue;
    }
    const directive = pattern[i + 1];
    i++;
    if (directive === "%") {
      literal += "%";
      continue;
    }
    const token = STRFTIME_TOKENS[directive];
    if (!token) {
      literal += `%${directive}`;
      continue;
    }
    flush();
    out += token;
  }
  flush();
  return out;
}

/** Подпись слота по strftime-шаблону из настроек. */
export function formatTimeslot(slot: Date, timeFormat: string): string {
  return format(slot, strftimeToDateFns(timeFormat));
}
