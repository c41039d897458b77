// =============================================================================
// strftime-style Formatting
// =============================================================================

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0");
}

function dayOfYear(date: Date): number {
  const day = Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());
  return (day - Date.UTC(date.getFullYear(), 0, 1)) / 86_400_000 + 1;
}

/**
 * Format a date in local time using strftime directives.
 * Supported: %Y %y %m %d %e %H %I %M %S %p %j %a %A %b %B %s %z %%.
 * Unknown directives are kept as written.
 */
export function formatDate(date: Date, format: string): string {
  return format.replace(/%(.)/g, (directive, code: string) => {
    switch (code) {
      case "Y":
        return String(date.getFullYear());
      case "y":
        return pad(date.getFullYear() % 100);
      case "m":
        return pad(date.getMonth() + 1);
      case "d":
        return pad(date.getDate());
      case "e":
        return String(date.getDate()).padStart(2, " ");
      case "H":
        return pad(date.getHours());
      case "I":
        return pad(date.getHours() % 12 || 12);
      case "M":
        return pad(date.getMinutes());
      case "S":
        return pad(date.getSeconds());
      case "p":
        return date.getHours() < 12 ? "AM" : "PM";
      case "j":
        return pad(dayOfYear(date), 3);
      case "a":
        return WEEKDAYS[date.getDay()].slice(0, 3);
      case "A":
        return WEEKDAYS[date.getDay()];
      case "b":
        return MONTHS[date.getMonth()].slice(0, 3);
      case "B":
        return MONTHS[date.getMonth()];
      case "s":
        return String(Math.floor(date.getTime() / 1000));
      case "z": {
        const offset = -date.getTimezoneOffset();
        const sign = offset >= 0 ? "+" : "-";
        const minutes = Math.abs(offset);
        return `${sign}${pad(Math.floor(minutes / 60))}${pad(minutes % 60)}`;
      }
      case "%":
        return "%";
      default:
        return directive;
    }
  });
}
