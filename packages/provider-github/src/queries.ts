const FIELD_NAME = "field { ... on ProjectV2FieldCommon { name } }";

export const ORGANIZATION_PROJECT_QUERY = `
  query OrganizationProject($owner: String!, $number: Int!) {
    organization(login: $owner) {
      projectV2(number: $number) { id }
    }
  }
`;

export const USER_PROJECT_QUERY = `
  query UserProject($owner: String!, $number: Int!) {
    user(login: $owner) {
      projectV2(number: $number) { id }
    }
  }
`;

export const PROJECT_ITEMS_QUERY = `
  query ProjectItems(
    $projectId: ID!
    $count: Int!
    $after: String
    $labelCount: Int!
    $fieldValueCount: Int!
  ) {
    node(id: $projectId) {
      ... on ProjectV2 {
        items(first: $count, after: $after) {
          nodes {
            id
            isArchived
            type
            updatedAt
            fieldValues(first: $fieldValueCount) {
              nodes {
                __typename
                ... on ProjectV2ItemFieldTextValue { text ${FIELD_NAME} }
                ... on ProjectV2ItemFieldDateValue { date ${FIELD_NAME} }
                ... on ProjectV2ItemFieldNumberValue { number ${FIELD_NAME} }
                ... on ProjectV2ItemFieldSingleSelectValue { name ${FIELD_NAME} }
                ... on ProjectV2ItemFieldIterationValue {
                  duration
                  iterationId
                  startDate
                  title
                  ${FIELD_NAME}
                }
                ... on ProjectV2ItemFieldLabelValue {
                  labels(first: $labelCount) { nodes { name } }
                }
              }
            }
            content {
              __typename
              ... on DraftIssue { title updatedAt }
              ... on Issue {
                title
                number
                url
                updatedAt
                closedAt
                repository { name nameWithOwner url }
              }
              ... on PullRequest {
                title
                number
                url
                updatedAt
                closedAt
                mergedAt
                baseRefName
                repository { name nameWithOwner url }
              }
            }
          }
          pageInfo { hasNextPage endCursor }
        }
      }
    }
  }
`;

export const ARCHIVE_ITEM_MUTATION = `
  mutation ArchiveProjectItem($projectId: ID!, $itemId: ID!) {
    archiveProjectV2Item(input: { projectId: $projectId, itemId: $itemId }) {
      clientMutationId
    }
  }
`;

export const UNARCHIVE_ITEM_MUTATION = `
  mutation UnarchiveProjectItem($projectId: ID!, $itemId: ID!) {
    unarchiveProjectV2Item(input: { projectId: $projectId, itemId: $itemId }) {
      clientMutationId
    }
  }
`;
