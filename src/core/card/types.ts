export type HaltAction = {
  title: string;
  url: string;
  iconUrl?: string;
};

export type CardTextBlock = {
  type: "TextBlock";
  text: string;
  size?: "Small" | "Default" | "Medium" | "Large";
  weight?: "Default" | "Lighter" | "Bolder";
  wrap?: boolean;
  isSubtle?: boolean;
};

export type CardColumn = {
  type: "Column";
  items: CardElement[];
  width: "auto" | "stretch";
  verticalContentAlignment?: "Top" | "Center" | "Bottom";
};

export type CardColumnSet = {
  type: "ColumnSet";
  columns: CardColumn[];
};

export type CardFactSet = {
  type: "FactSet";
  facts: { title: string; value: string }[];
};

export type CardElement = CardTextBlock | CardColumnSet | CardFactSet;

export type CardOpenUrlAction = {
  type: "Action.OpenUrl";
  title: string;
  url: string;
  style: "default" | "positive" | "destructive";
  iconUrl?: string;
};

export type AdaptiveCard = {
  $schema: "http://adaptivecards.io/schemas/adaptive-card.json";
  type: "AdaptiveCard";
  version: "1.2";
  body: CardElement[];
  actions: CardOpenUrlAction[];
};

export type TeamsMessage = {
  type: "message";
  attachments: {
    contentType: "application/vnd.microsoft.card.adaptive";
    content: AdaptiveCard;
  }[];
};
