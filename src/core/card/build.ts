import { formatPercent } from "../rollout/steps";
import type {
  AdaptiveCard,
  CardElement,
  CardOpenUrlAction,
  HaltAction,
  TeamsMessage,
} from "./types";

export const CARD_HEADER = "Bitrise";
export const CARD_TITLE = "Google Console Rollout Updater";
export const HALT_SIGN_IN_NOTICE =
  "The halt buttons require the Google account with Play Console access to be the primary (first) account signed in. If it isn't, sign out of all accounts and sign back in starting with that account.";

export type RolloutCardInput = {
  packageName: string;
  track: string;
  releaseName?: string;
  from: number;
  to: number;
  increaseTime: string;
  haltActions: readonly HaltAction[];
};

export function formatIncreaseSentence(
  from: number,
  to: number,
  increaseTime: string
): string {
  return `The current staged release will automatically increase from ${formatPercent(from)}% to ${formatPercent(to)}% at ${increaseTime}.`;
}

export function buildRolloutCard(input: RolloutCardInput): TeamsMessage {
  const body: CardElement[] = [
    {
      type: "TextBlock",
      size: "Medium",
      weight: "Bolder",
      text: CARD_HEADER,
    },
    {
      type: "ColumnSet",
      columns: [
        {
          type: "Column",
          items: [
            {
              type: "TextBlock",
              weight: "Bolder",
              text: CARD_TITLE,
              wrap: true,
            },
          ],
          width: "stretch",
          verticalContentAlignment: "Center",
        },
      ],
    },
    {
      type: "TextBlock",
      text: formatIncreaseSentence(input.from, input.to, input.increaseTime),
      wrap: true,
    },
    {
      type: "FactSet",
      facts: [
        { title: "Package", value: input.packageName },
        { title: "Track", value: input.track },
        ...(input.releaseName
          ? [{ title: "Release", value: input.releaseName }]
          : []),
      ],
    },
  ];

  if (input.haltActions.length > 0) {
    body.push({
      type: "TextBlock",
      text: HALT_SIGN_IN_NOTICE,
      wrap: true,
      isSubtle: true,
    });
  }

  const card: AdaptiveCard = {
    $schema: "http://adaptivecards.io/schemas/adaptive-card.json",
    type: "AdaptiveCard",
    version: "1.2",
    body,
    actions: input.haltActions.map(toOpenUrlAction),
  };

  return {
    type: "message",
    attachments: [
      {
        contentType: "application/vnd.microsoft.card.adaptive",
        content: card,
      },
    ],
  };
}

function toOpenUrlAction(action: HaltAction): CardOpenUrlAction {
  return {
    type: "Action.OpenUrl",
    title: action.title,
    url: action.url,
    style: "destructive",
    ...(action.iconUrl ? { iconUrl: action.iconUrl } : {}),
  };
}
