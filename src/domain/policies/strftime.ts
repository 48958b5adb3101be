/**
 * Политика: подмножество strftime для плейсхолдера `{ts}` в именах файлов.
 *
 * Поддерживаются `%Y %y %m %d %H %M %S %f %j %b %a %%`; неизвестные директивы
 * остаются в строке как есть. Время локальное.
 */

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];
const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

function dayOfYear(d: Date): number {
  const start = new Date(d.getFullYear(), 0, 1);
  const startUtc = Date.UTC(start.getFullYear(), start.getMonth(), start.getDate());
  const dUtc = Date.UTC(d.getFullYear(), d.getMonth(), d.getDate());
  return Math.floor((dUtc - startUtc) / 86_400_000) + 1;
}

export function formatStrftime(d: Date, pattern: string): string {
  return String(pattern ?? "").replace(/%(.)/g, (whole, directive: string) => {
    switch (directive) {
      case "Y":
        return pad(d.getFullYear(), 4);
      case "y":
        return pad(d.getFullYear() % 100, 2);
      case "m":
        return pad(d.getMonth() + 1, 2);
      case "d":
        return pad(d.getDate(), 2);
      case "H":
        return pad(d.getHours(), 2);
      case "M":
        return pad(d.getMinutes(), 2);
      case "S":
        return pad(d.getSeconds(), 2);
      case "f":
        // в JS точность до миллисекунд, микросекунды добиваем нулями
        return pad(d.getMilliseconds() * 1000, 6);
      case "j":
        return pad(dayOfYear(d), 3);
      case "b":
        return MONTHS[d.getMonth()] ?? "";
      case "a":
        return WEEKDAYS[d.getDay()] ?? "";
      case "%":
        return "%";
      default:
        return whole;
    }
  });
}
