export interface DemoQuery {
  title: string;
  description: string;
  cypher: string;
  maxItems: number;
}

export const DEMO_QUERIES: readonly DemoQuery[] = [
  {
    title: "MULTI-HOP REASONING: Papers from Stanford-MIT collaborations",
    description: "Stanford-MIT collaboration papers",
    maxItems: 10,
    cypher: `
      MATCH (p:Paper)<-[:AUTHORED]-(a1:Author)-[:AFFILIATED_WITH]->(:Institution {name: "Stanford University"})
      MATCH (p)<-[:AUTHORED]-(a2:Author)-[:AFFILIATED_WITH]->(:Institution {name: "Massachusetts Institute of Technology"})
      WHERE a1 <> a2
      RETURN p.title AS paper_title,
             collect(DISTINCT a1.name) AS stanford_authors,
             collect(DISTINCT a2.name) AS mit_authors,
             p.year AS year,
             p.citation_count AS citations
      ORDER BY year DESC, paper_title
    `
  },
  {
    title: "TOPIC DISCOVERY: GraphRAG papers and their citation network",
    description: "RAG topic exploration",
    maxItems: 3,
    cypher: `
      MATCH (p:Paper)-[:ABOUT]->(:Topic {name: "Retrieval-Augmented Generation"})
      OPTIONAL MATCH (p)<-[:CITES]-(citing:Paper)
      OPTIONAL MATCH (p)-[:CITES]->(cited:Paper)
      RETURN p.title AS paper_title,
             p.abstract AS abstract,
             collect(DISTINCT citing.title) AS cited_by,
             collect(DISTINCT cited.title) AS cites,
             p.citation_count AS total_citations
      ORDER BY total_citations DESC
    `
  },
  {
    title: "AUTHOR EXPERTISE: Most influential authors in Knowledge Graphs",
    description: "Knowledge graph author expertise",
    maxItems: 10,
    cypher: `
      MATCH (a:Author)-[:AUTHORED]->(p:Paper)-[:ABOUT]->(:Topic {name: "Knowledge Graphs"})
      MATCH (a)-[:AFFILIATED_WITH]->(i:Institution)
      WITH a, i, count(p) AS papers_count, sum(p.citation_count) AS total_citations
      RETURN a.name AS author_name,
             a.h_index AS h_index,
             i.name AS institution,
             papers_count AS kg_papers,
             total_citations AS kg_citations
      ORDER BY kg_citations DESC, author_name
    `
  },
  {
    title: "VENUE ANALYSIS: Research impact by publication venue",
    description: "Venue impact analysis",
    maxItems: 10,
    cypher: `
      MATCH (p:Paper)-[:PUBLISHED_IN]->(v:Venue)
      MATCH (p)-[:ABOUT]->(t:Topic)
      WITH v, t, count(p) AS paper_count, avg(p.citation_count) AS avg_citations
      WHERE paper_count > 0
      RETURN v.name AS venue_name,
             v.type AS venue_type,
             collect(DISTINCT t.name) AS topics_covered,
             paper_count AS papers_published,
             round(avg_citations, 2) AS avg_citations_per_paper
      ORDER BY avg_citations_per_paper DESC
    `
  },
  {
    title: "TOPIC RELATIONSHIPS: Related research areas",
    description: "Topic relationship exploration",
    maxItems: 10,
    cypher: `
      MATCH (t1:Topic)-[:RELATED_TO]-(t2:Topic)
      MATCH (p1:Paper)-[:ABOUT]->(t1)
      MATCH (p2:Paper)-[:ABOUT]->(t2)
      WITH t1, t2, count(DISTINCT p1) AS t1_papers, count(DISTINCT p2) AS t2_papers
      RETURN t1.name AS topic_1,
             t2.name AS topic_2,
             t1_papers AS papers_topic_1,
             t2_papers AS papers_topic_2
      ORDER BY papers_topic_1 DESC, papers_topic_2 DESC, topic_1, topic_2
    `
  },
  {
    title: "CITATION NETWORK: Paper influence paths",
    description: "Citation network analysis",
    maxItems: 10,
    cypher: `
      MATCH path = (p1:Paper)-[:CITES*1..2]->(p2:Paper)
      WHERE p1.title CONTAINS "GraphRAG" OR p2.title CONTAINS "GraphRAG"
      RETURN p1.title AS citing_paper,
             p2.title AS cited_paper,
             length(path) AS citation_distance,
             p1.year AS citing_year,
             p2.year AS cited_year
      ORDER BY citation_distance, citing_year DESC, citing_paper, cited_paper
    `
  }
];
