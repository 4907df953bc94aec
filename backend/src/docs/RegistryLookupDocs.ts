export default `# Extensible NFT Holdings Lookup

Indexes the Transfer events of an extensible collection into one record per live token.

Each record holds the token id, the extension the token was minted into, and its current owner key.

## Event Handling

- **Mint** (Transfer from the null identity): a record is created.
- **Transfer** between two identities: the owner key of the record is updated. The extension never changes.
- **Burn** (Transfer to the null identity): the record is deleted.
- Approval, ApprovalForAll and DistributionFinalized events are ignored.

## Queries

Send a query to \`ls_extensible_nft\` with any of:

- \`tokenId\`: the record of a single token
- \`ownerKey\`: every token held by an identity
- \`extensionId\`: every live token of an extension
- \`limit\`, \`skip\`, \`sortOrder\` ('asc' | 'desc', by token id) for pagination

\`ownerKey\` and \`extensionId\` can be combined.`
