// All stored time fields come from one captured instant, in UTC

export interface TimeFields {
  timestamp: string;
  date: string;
  hour: number;
  minute: number;
}

export function timeFields(at: Date): TimeFields {
  return {
    timestamp: at.toISOString(),
    date: at.toISOString().slice(0, 10),
    hour: at.getUTCHours(),
    minute: at.getUTCMinutes(),
  };
}

// {YYYY-MM-DD}_{HH-MM-SS-mmm}_{TAG}: two reports in the same millisecond still get separate folders
export function reportFolderName(at: Date, tag: string): string {
  const iso = at.toISOString();
  return `${iso.slice(0, 10)}_${iso.slice(11, 23).replace(/[:.]/g, "-")}_${tag}`;
}

export function formatDisplayTime(at: Date, timeZone: string, hour12: boolean): string {
  return at.toLocaleString("en-US", {
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12,
    timeZone,
    timeZoneName: "short",
  });
}
