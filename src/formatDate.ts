import moment from "moment";

export const ISO_DATE = "YYYY-MM-DD";

/** Calendar date (YYYY-MM-DD) of `date` as seen from `timeZone`. */
export function formatIsoDate(date: Date, timeZone: string) {
  const zonedDate = new Date(date.toLocaleString("en-US", { timeZone }));
  const year = zonedDate.getFullYear();
  const month = (zonedDate.getMonth() + 1).toString().padStart(2, "0");
  const day = zonedDate.getDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function addDays(isoDate: string, days: number) {
  return moment(isoDate, ISO_DATE, true).add(days, "days").format(ISO_DATE);
}

export function startOfMonth(isoDate: string) {
  return `${isoDate.slice(0, 8)}01`;
}
