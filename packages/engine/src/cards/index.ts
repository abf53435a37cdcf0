export { Card } from "./card";
export { CardDatabase, compareSortKeys, toIndexName, type CardInfo, type CardSortKey } from "./card-database";
