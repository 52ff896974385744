const FLAGS = {
  usaflag: "United States",
  usaflag1: "United States (Colonial/Revolutionary)",
  britishflag: "Great Britain",
  frenchflag: "France",
  spanishflag: "Spain",
  mexicanflag: "Mexico",
  confederateflag: "Confederate States",
  russianflag: "Russia",
  dutchflag: "Netherlands",
  swedishflag: "Sweden",
} as const;

export type FlagToken = keyof typeof FLAGS;

export default FLAGS;
