import PodcastStudio from '../components/PodcastStudio';

export default function Home() {
  return <PodcastStudio />;
}
